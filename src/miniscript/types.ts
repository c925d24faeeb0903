// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { MiniscriptError } from '../errors.js';
import type { MiniscriptKey, Hash160Value } from '../keys.js';
import { scriptNumSize } from '../scriptUtils.js';
import type { Fragment, Node } from './ast.js';
import { nodeToString } from './ast.js';
import type { ScriptContext } from './context.js';

//Type system: https://bitcoin.sipa.be/miniscript/ ("Correctness properties"
//and "Malleability")

export type Base = 'B' | 'V' | 'K' | 'W';

export interface Correctness {
  base: Base;
  /** Consumes exactly 0 stack elements */
  z: boolean;
  /** Consumes exactly 1 stack element */
  o: boolean;
  /** The top input is never empty when satisfied */
  n: boolean;
  /** A dissatisfaction exists */
  d: boolean;
  /** Leaves exactly 1 on the stack when satisfied */
  u: boolean;
}

export interface Malleability {
  /** Every satisfaction needs a signature */
  s: boolean;
  /** Forced: no dissatisfaction exists */
  f: boolean;
  /** Expressive: a unique dissatisfaction without signatures exists */
  e: boolean;
  /** Non-malleable satisfactions exist */
  m: boolean;
}

export interface Type {
  corr: Correctness;
  mall: Malleability;
}

/**
 * Non-push opcodes counted against the 201 op limit: `count` is what the
 * script contains, `sat` and `nsat` add the keys checked by CHECKMULTISIG
 * on the satisfying or dissatisfying path. Undefined when the path does
 * not exist.
 */
export interface OpLimits {
  count: number;
  sat: number | undefined;
  nsat: number | undefined;
}

/** Upper bound of the data pushed by a satisfaction */
export interface SatCost {
  /** Stack elements */
  count: number;
  /** Bytes as witness elements (length prefixes included) */
  witness: number;
  /** Bytes as scriptSig pushes */
  scriptSig: number;
}

export interface TimelockInfo {
  csvWithHeight: boolean;
  csvWithTime: boolean;
  cltvWithHeight: boolean;
  cltvWithTime: boolean;
  /** Some satisfaction path needs both a height and a time lock */
  containsCombination: boolean;
}

export interface ExtData {
  scriptSize: number;
  ops: OpLimits;
  /** The last opcode has a VERIFY form that `v:` can fold into */
  hasFreeVerify: boolean;
  satSize: SatCost | undefined;
  dissatSize: SatCost | undefined;
  timelocks: TimelockInfo;
}

const SEQUENCE_LOCKTIME_TYPE_FLAG = 1 << 22;
const LOCKTIME_THRESHOLD = 500000000;

// ---- Cost arithmetic. Undefined means "impossible" ----

const addOps = (...values: (number | undefined)[]): number | undefined =>
  values.some(v => v === undefined)
    ? undefined
    : values.reduce<number>((sum, v) => sum + (v ?? 0), 0);

const maxOps = (a: number | undefined, b: number | undefined) =>
  a === undefined ? b : b === undefined ? a : Math.max(a, b);

const ZERO_COST: SatCost = { count: 0, witness: 0, scriptSig: 0 };
const PUSH_0: SatCost = { count: 1, witness: 1, scriptSig: 1 };
const PUSH_1: SatCost = { count: 1, witness: 2, scriptSig: 1 };
const PREIMAGE: SatCost = { count: 1, witness: 33, scriptSig: 33 };

function addCost(...costs: (SatCost | undefined)[]): SatCost | undefined {
  let total = ZERO_COST;
  for (const cost of costs) {
    if (cost === undefined) return undefined;
    total = {
      count: total.count + cost.count,
      witness: total.witness + cost.witness,
      scriptSig: total.scriptSig + cost.scriptSig
    };
  }
  return total;
}

function maxCost(
  a: SatCost | undefined,
  b: SatCost | undefined
): SatCost | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return {
    count: Math.max(a.count, b.count),
    witness: Math.max(a.witness, b.witness),
    scriptSig: Math.max(a.scriptSig, b.scriptSig)
  };
}

const signatureCost = (ctx: ScriptContext, signatures = 1): SatCost => ({
  count: signatures,
  witness: ctx.sigSize * signatures,
  scriptSig: ctx.sigSize * signatures
});

// ---- Timelocks ----

const NO_TIMELOCKS: TimelockInfo = {
  csvWithHeight: false,
  csvWithTime: false,
  cltvWithHeight: false,
  cltvWithTime: false,
  containsCombination: false
};

function combineTimelocks(
  a: TimelockInfo,
  b: TimelockInfo,
  { and }: { and: boolean }
): TimelockInfo {
  const mixes =
    (a.csvWithHeight && b.csvWithTime) ||
    (a.csvWithTime && b.csvWithHeight) ||
    (a.cltvWithHeight && b.cltvWithTime) ||
    (a.cltvWithTime && b.cltvWithHeight);
  return {
    csvWithHeight: a.csvWithHeight || b.csvWithHeight,
    csvWithTime: a.csvWithTime || b.csvWithTime,
    cltvWithHeight: a.cltvWithHeight || b.cltvWithHeight,
    cltvWithTime: a.cltvWithTime || b.cltvWithTime,
    containsCombination:
      a.containsCombination || b.containsCombination || (and && mixes)
  };
}

// ---- Type rules ----

type AnyFragment = Fragment<MiniscriptKey, Hash160Value>;

const leaf = (base: Base, flags: string, mall: string): Type => ({
  corr: {
    base,
    z: flags.includes('z'),
    o: flags.includes('o'),
    n: flags.includes('n'),
    d: flags.includes('d'),
    u: flags.includes('u')
  },
  mall: {
    s: mall.includes('s'),
    f: mall.includes('f'),
    e: mall.includes('e'),
    m: mall.includes('m')
  }
});

/**
 * Computes the correctness and malleability type of `node` from the types
 * of its children, throwing a `TypeCheck` error when a child does not have
 * the type its parent requires.
 */
export function typeCheck<Pk extends MiniscriptKey, H extends Hash160Value>(
  node: Node<Pk, H>
): Type {
  const fail = (reason: string): never => {
    throw new MiniscriptError(
      'TypeCheck',
      `Error: ${nodeToString(node)} does not type check: ${reason}`
    );
  };
  const checkChild = (
    child: AnyFragment,
    base: Base | Base[],
    props = ''
  ): Correctness => {
    const corr = child.ty.corr;
    const bases = Array.isArray(base) ? base : [base];
    if (!bases.includes(corr.base))
      fail(`${child.toString()} is ${corr.base}, expected ${bases.join('/')}`);
    for (const prop of props) {
      if (
        (prop === 'z' && !corr.z) ||
        (prop === 'o' && !corr.o) ||
        (prop === 'n' && !corr.n) ||
        (prop === 'd' && !corr.d) ||
        (prop === 'u' && !corr.u)
      )
        fail(`${child.toString()} is not ${prop}`);
    }
    return corr;
  };

  switch (node.type) {
    case 'true':
      return leaf('B', 'zu', 'fm');
    case 'false':
      return leaf('B', 'zud', 'sem');
    case 'pk_k':
      return leaf('K', 'ondu', 'sem');
    case 'pk_h':
    case 'raw_pkh':
      return leaf('K', 'ndu', 'sem');
    case 'after':
    case 'older':
      if (!Number.isInteger(node.n) || node.n < 1 || node.n >= 0x80000000)
        throw new MiniscriptError(
          'BadNumber',
          `Error: ${node.type}(${node.n}) timelock must be between 1 and 2^31-1`
        );
      return leaf('B', 'z', 'fm');
    case 'sha256':
    case 'hash256':
    case 'ripemd160':
    case 'hash160':
      return leaf('B', 'ondu', 'm');
    case 'multi':
      if (node.k < 1 || node.k > node.keys.length || node.keys.length > 20)
        fail('multi requires 1 <= k <= n <= 20');
      return leaf('B', 'ndu', 'sem');
    case 'multi_a':
      if (node.k < 1 || node.k > node.keys.length || node.keys.length > 999)
        fail('multi_a requires 1 <= k <= n <= 999');
      return leaf('B', 'du', 'sem');
    case 'alt': {
      const x = checkChild(node.sub, 'B');
      return {
        corr: { base: 'W', z: false, o: false, n: false, d: x.d, u: x.u },
        mall: node.sub.ty.mall
      };
    }
    case 'swap': {
      const x = checkChild(node.sub, 'B', 'o');
      return {
        corr: { base: 'W', z: false, o: false, n: false, d: x.d, u: x.u },
        mall: node.sub.ty.mall
      };
    }
    case 'check': {
      const x = checkChild(node.sub, 'K');
      return { corr: { ...x, base: 'B', u: true }, mall: node.sub.ty.mall };
    }
    case 'dupif': {
      checkChild(node.sub, 'V', 'z');
      const m = node.sub.ty.mall;
      return {
        corr: { base: 'B', z: false, o: true, n: true, d: true, u: true },
        mall: { s: m.s, f: false, e: true, m: m.m }
      };
    }
    case 'verify': {
      const x = checkChild(node.sub, 'B');
      const m = node.sub.ty.mall;
      return {
        corr: { base: 'V', z: x.z, o: x.o, n: x.n, d: false, u: false },
        mall: { s: m.s, f: true, e: false, m: m.m }
      };
    }
    case 'nonzero': {
      const x = checkChild(node.sub, 'B', 'n');
      const m = node.sub.ty.mall;
      return {
        corr: { base: 'B', z: false, o: x.o, n: true, d: true, u: x.u },
        mall: { s: m.s, f: false, e: m.f, m: m.m }
      };
    }
    case 'zeronotequal': {
      const x = checkChild(node.sub, 'B');
      return { corr: { ...x, u: true }, mall: node.sub.ty.mall };
    }
    case 'and_v': {
      const x = checkChild(node.left, 'V');
      const y = checkChild(node.right, ['B', 'K', 'V']);
      const mx = node.left.ty.mall;
      const my = node.right.ty.mall;
      return {
        corr: {
          base: y.base,
          z: x.z && y.z,
          o: (x.z && y.o) || (x.o && y.z),
          n: x.n || (x.z && y.n),
          d: false,
          u: y.u
        },
        mall: {
          s: mx.s || my.s,
          f: mx.s || my.f,
          e: false,
          m: mx.m && my.m
        }
      };
    }
    case 'and_b': {
      const x = checkChild(node.left, 'B');
      const y = checkChild(node.right, 'W');
      const mx = node.left.ty.mall;
      const my = node.right.ty.mall;
      return {
        corr: {
          base: 'B',
          z: x.z && y.z,
          o: (x.z && y.o) || (x.o && y.z),
          n: x.n || (x.z && y.n),
          d: x.d && y.d,
          u: true
        },
        mall: {
          s: mx.s || my.s,
          f: (mx.f && my.f) || (mx.s && mx.f) || (my.s && my.f),
          e: mx.e && my.e && mx.s && my.s,
          m: mx.m && my.m
        }
      };
    }
    case 'andor': {
      const x = checkChild(node.a, 'B', 'du');
      const y = checkChild(node.b, ['B', 'K', 'V']);
      const z = checkChild(node.c, y.base);
      const mx = node.a.ty.mall;
      const my = node.b.ty.mall;
      const mz = node.c.ty.mall;
      return {
        corr: {
          base: y.base,
          z: x.z && y.z && z.z,
          o: (x.z && y.o && z.o) || (x.o && y.z && z.z),
          n: false,
          d: z.d,
          u: y.u && z.u
        },
        mall: {
          s: mz.s && (mx.s || my.s),
          f: mz.f && (mx.s || my.f),
          e: mz.e && (mx.s || my.f),
          m: mx.m && my.m && mz.m && mx.e && (mx.s || my.s || mz.s)
        }
      };
    }
    case 'or_b': {
      const x = checkChild(node.left, 'B', 'd');
      const z = checkChild(node.right, 'W', 'd');
      const mx = node.left.ty.mall;
      const mz = node.right.ty.mall;
      return {
        corr: {
          base: 'B',
          z: x.z && z.z,
          o: (x.z && z.o) || (x.o && z.z),
          n: false,
          d: true,
          u: true
        },
        mall: {
          s: mx.s && mz.s,
          f: false,
          e: mx.e && mz.e,
          m: mx.m && mz.m && mx.e && mz.e && (mx.s || mz.s)
        }
      };
    }
    case 'or_d': {
      const x = checkChild(node.left, 'B', 'du');
      const z = checkChild(node.right, 'B');
      const mx = node.left.ty.mall;
      const mz = node.right.ty.mall;
      return {
        corr: {
          base: 'B',
          z: x.z && z.z,
          o: x.o && z.z,
          n: false,
          d: z.d,
          u: z.u
        },
        mall: {
          s: mx.s && mz.s,
          f: mz.f,
          e: mx.e && mz.e,
          m: mx.m && mz.m && mx.e && (mx.s || mz.s)
        }
      };
    }
    case 'or_c': {
      const x = checkChild(node.left, 'B', 'du');
      const z = checkChild(node.right, 'V');
      const mx = node.left.ty.mall;
      const mz = node.right.ty.mall;
      return {
        corr: {
          base: 'V',
          z: x.z && z.z,
          o: x.o && z.z,
          n: false,
          d: false,
          u: false
        },
        mall: {
          s: mx.s && mz.s,
          f: true,
          e: false,
          m: mx.m && mz.m && mx.e && (mx.s || mz.s)
        }
      };
    }
    case 'or_i': {
      const x = checkChild(node.left, ['B', 'K', 'V']);
      const z = checkChild(node.right, x.base);
      const mx = node.left.ty.mall;
      const mz = node.right.ty.mall;
      return {
        corr: {
          base: x.base,
          z: false,
          o: x.z && z.z,
          n: false,
          d: x.d || z.d,
          u: x.u && z.u
        },
        mall: {
          s: mx.s && mz.s,
          f: mx.f && mz.f,
          e: (mx.e && mz.f) || (mz.e && mx.f),
          m: mx.m && mz.m && (mx.s || mz.s)
        }
      };
    }
    case 'thresh': {
      const n = node.subs.length;
      if (node.k < 1 || node.k > n) fail('thresh requires 1 <= k <= n');
      const corrs = node.subs.map((sub, i) =>
        checkChild(sub, i === 0 ? 'B' : 'W', 'du')
      );
      const malls = node.subs.map(sub => sub.ty.mall);
      const countS = malls.filter(m => m.s).length;
      const countO = corrs.filter(c => c.o).length;
      const allZ = corrs.every(c => c.z);
      const allE = malls.every(m => m.e);
      return {
        corr: {
          base: 'B',
          z: allZ,
          o: countO === 1 && corrs.every(c => c.o || c.z),
          n: false,
          d: true,
          u: true
        },
        mall: {
          s: countS >= n - node.k,
          f: false,
          e: allE && countS === n,
          m: malls.every(m => m.m) && allE && countS >= n - node.k
        }
      };
    }
  }
}

// ---- Extra data ----

function thresholdSatCost(
  subs: AnyFragment[],
  k: number
): SatCost | undefined {
  const dissats = subs.map(sub => sub.ext.dissatSize);
  const base = addCost(...dissats);
  if (base === undefined) return undefined;
  const gains = subs.map(sub => {
    const sat = sub.ext.satSize;
    const dissat = sub.ext.dissatSize;
    if (sat === undefined || dissat === undefined) return undefined;
    return {
      count: sat.count - dissat.count,
      witness: sat.witness - dissat.witness,
      scriptSig: sat.scriptSig - dissat.scriptSig
    };
  });
  const satisfiable = gains.filter(
    (gain): gain is SatCost => gain !== undefined
  );
  if (satisfiable.length < k) return undefined;
  //each component picks its own k worst satisfactions: an upper bound
  const topK = (pick: (cost: SatCost) => number) =>
    satisfiable
      .map(pick)
      .sort((a, b) => b - a)
      .slice(0, k)
      .reduce((sum, v) => sum + v, 0);
  return {
    count: base.count + topK(c => c.count),
    witness: base.witness + topK(c => c.witness),
    scriptSig: base.scriptSig + topK(c => c.scriptSig)
  };
}

function thresholdOps(subs: AnyFragment[], k: number): number | undefined {
  let forced = 0;
  let total = 0;
  const gains: number[] = [];
  for (const sub of subs) {
    const { sat, nsat } = sub.ext.ops;
    if (sat === undefined && nsat === undefined) return undefined;
    if (nsat === undefined) {
      forced++;
      total += sat ?? 0;
    } else if (sat === undefined) total += nsat;
    else {
      total += nsat;
      gains.push(sat - nsat);
    }
  }
  if (forced > k || forced + gains.length < k) return undefined;
  gains.sort((a, b) => b - a);
  for (const gain of gains.slice(0, k - forced)) total += gain;
  return total;
}

/**
 * Script size, op counts, satisfaction cost and timelocks of `node`, built
 * from the data already computed for its children.
 */
export function extData<Pk extends MiniscriptKey, H extends Hash160Value>(
  node: Node<Pk, H>,
  ctx: ScriptContext
): ExtData {
  const sig = signatureCost(ctx);
  switch (node.type) {
    case 'true':
      return {
        scriptSize: 1,
        ops: { count: 0, sat: 0, nsat: undefined },
        hasFreeVerify: false,
        satSize: ZERO_COST,
        dissatSize: undefined,
        timelocks: NO_TIMELOCKS
      };
    case 'false':
      return {
        scriptSize: 1,
        ops: { count: 0, sat: undefined, nsat: 0 },
        hasFreeVerify: false,
        satSize: undefined,
        dissatSize: ZERO_COST,
        timelocks: NO_TIMELOCKS
      };
    case 'pk_k':
      return {
        scriptSize: ctx.pkLen(node.key),
        ops: { count: 0, sat: 0, nsat: 0 },
        hasFreeVerify: false,
        satSize: sig,
        dissatSize: PUSH_0,
        timelocks: NO_TIMELOCKS
      };
    case 'pk_h':
    case 'raw_pkh': {
      const keyPush = node.type === 'pk_h' ? ctx.pkLen(node.key) : 34;
      const keyCost: SatCost = {
        count: 1,
        witness: keyPush,
        scriptSig: keyPush
      };
      return {
        scriptSize: 24,
        ops: { count: 3, sat: 3, nsat: 3 },
        hasFreeVerify: false,
        satSize: addCost(sig, keyCost),
        dissatSize: addCost(PUSH_0, keyCost),
        timelocks: NO_TIMELOCKS
      };
    }
    case 'after':
    case 'older': {
      const isTime =
        node.type === 'older'
          ? (node.n & SEQUENCE_LOCKTIME_TYPE_FLAG) !== 0
          : node.n >= LOCKTIME_THRESHOLD;
      return {
        scriptSize: scriptNumSize(node.n) + 1,
        ops: { count: 1, sat: 1, nsat: undefined },
        hasFreeVerify: false,
        satSize: ZERO_COST,
        dissatSize: undefined,
        timelocks: {
          ...NO_TIMELOCKS,
          csvWithHeight: node.type === 'older' && !isTime,
          csvWithTime: node.type === 'older' && isTime,
          cltvWithHeight: node.type === 'after' && !isTime,
          cltvWithTime: node.type === 'after' && isTime
        }
      };
    }
    case 'sha256':
    case 'hash256':
    case 'ripemd160':
    case 'hash160':
      return {
        scriptSize:
          node.type === 'sha256' || node.type === 'hash256' ? 39 : 27,
        ops: { count: 4, sat: 4, nsat: 4 },
        hasFreeVerify: true,
        satSize: PREIMAGE,
        dissatSize: PREIMAGE,
        timelocks: NO_TIMELOCKS
      };
    case 'multi': {
      const n = node.keys.length;
      const empties: SatCost = {
        count: node.k + 1,
        witness: node.k + 1,
        scriptSig: node.k + 1
      };
      return {
        scriptSize:
          scriptNumSize(node.k) +
          1 +
          scriptNumSize(n) +
          node.keys.reduce((sum, key) => sum + ctx.pkLen(key), 0),
        ops: { count: 1, sat: n + 1, nsat: n + 1 },
        hasFreeVerify: true,
        satSize: addCost(PUSH_0, signatureCost(ctx, node.k)),
        dissatSize: empties,
        timelocks: NO_TIMELOCKS
      };
    }
    case 'multi_a': {
      const n = node.keys.length;
      const empties = n - node.k;
      return {
        scriptSize: 34 * n + scriptNumSize(node.k) + 1,
        ops: { count: n + 1, sat: n + 1, nsat: n + 1 },
        hasFreeVerify: true,
        satSize: {
          count: n,
          witness: ctx.sigSize * node.k + empties,
          scriptSig: ctx.sigSize * node.k + empties
        },
        dissatSize: { count: n, witness: n, scriptSig: n },
        timelocks: NO_TIMELOCKS
      };
    }
    case 'alt':
    case 'swap':
    case 'check':
    case 'zeronotequal': {
      const x = node.sub.ext;
      const extra = node.type === 'alt' ? 2 : 1;
      return {
        scriptSize: x.scriptSize + extra,
        ops: {
          count: x.ops.count + extra,
          sat: addOps(x.ops.sat, extra),
          nsat: addOps(x.ops.nsat, extra)
        },
        hasFreeVerify:
          node.type === 'check' || (node.type === 'swap' && x.hasFreeVerify),
        satSize: x.satSize,
        dissatSize: x.dissatSize,
        timelocks: x.timelocks
      };
    }
    case 'dupif':
    case 'nonzero': {
      const x = node.sub.ext;
      const extra = node.type === 'dupif' ? 3 : 4;
      return {
        scriptSize: x.scriptSize + extra,
        ops: {
          count: x.ops.count + extra,
          sat: addOps(x.ops.sat, extra),
          nsat: x.ops.count + extra
        },
        hasFreeVerify: false,
        satSize: node.type === 'dupif' ? addCost(x.satSize, PUSH_1) : x.satSize,
        dissatSize: PUSH_0,
        timelocks: x.timelocks
      };
    }
    case 'verify': {
      const x = node.sub.ext;
      const extra = x.hasFreeVerify ? 0 : 1;
      return {
        scriptSize: x.scriptSize + extra,
        ops: {
          count: x.ops.count + extra,
          sat: addOps(x.ops.sat, extra),
          nsat: undefined
        },
        hasFreeVerify: false,
        satSize: x.satSize,
        dissatSize: undefined,
        timelocks: x.timelocks
      };
    }
    case 'and_v':
    case 'and_b': {
      const l = node.left.ext;
      const r = node.right.ext;
      const extra = node.type === 'and_b' ? 1 : 0;
      return {
        scriptSize: l.scriptSize + r.scriptSize + extra,
        ops: {
          count: l.ops.count + r.ops.count + extra,
          sat: addOps(l.ops.sat, r.ops.sat, extra),
          nsat:
            node.type === 'and_b'
              ? addOps(l.ops.nsat, r.ops.nsat, extra)
              : undefined
        },
        hasFreeVerify: node.type === 'and_v' && r.hasFreeVerify,
        satSize: addCost(l.satSize, r.satSize),
        dissatSize:
          node.type === 'and_b' ? addCost(l.dissatSize, r.dissatSize) : undefined,
        timelocks: combineTimelocks(l.timelocks, r.timelocks, { and: true })
      };
    }
    case 'andor': {
      const a = node.a.ext;
      const b = node.b.ext;
      const c = node.c.ext;
      return {
        scriptSize: a.scriptSize + b.scriptSize + c.scriptSize + 3,
        ops: {
          count: a.ops.count + b.ops.count + c.ops.count + 3,
          sat: addOps(
            maxOps(
              addOps(a.ops.sat, b.ops.sat, c.ops.count),
              addOps(a.ops.nsat, c.ops.sat, b.ops.count)
            ),
            3
          ),
          nsat: addOps(a.ops.nsat, c.ops.nsat, b.ops.count, 3)
        },
        hasFreeVerify: false,
        satSize: maxCost(
          addCost(a.satSize, b.satSize),
          addCost(a.dissatSize, c.satSize)
        ),
        dissatSize: addCost(a.dissatSize, c.dissatSize),
        timelocks: combineTimelocks(
          combineTimelocks(a.timelocks, b.timelocks, { and: true }),
          c.timelocks,
          { and: false }
        )
      };
    }
    case 'or_b': {
      const l = node.left.ext;
      const r = node.right.ext;
      return {
        scriptSize: l.scriptSize + r.scriptSize + 1,
        ops: {
          count: l.ops.count + r.ops.count + 1,
          sat: addOps(
            maxOps(
              addOps(l.ops.sat, r.ops.nsat),
              addOps(l.ops.nsat, r.ops.sat)
            ),
            1
          ),
          nsat: addOps(l.ops.nsat, r.ops.nsat, 1)
        },
        hasFreeVerify: false,
        satSize: maxCost(
          addCost(l.satSize, r.dissatSize),
          addCost(l.dissatSize, r.satSize)
        ),
        dissatSize: addCost(l.dissatSize, r.dissatSize),
        timelocks: combineTimelocks(l.timelocks, r.timelocks, { and: false })
      };
    }
    case 'or_d':
    case 'or_c': {
      const l = node.left.ext;
      const r = node.right.ext;
      const extra = node.type === 'or_d' ? 3 : 2;
      return {
        scriptSize: l.scriptSize + r.scriptSize + extra,
        ops: {
          count: l.ops.count + r.ops.count + extra,
          sat: addOps(
            maxOps(
              addOps(l.ops.sat, r.ops.count),
              addOps(l.ops.nsat, r.ops.sat)
            ),
            extra
          ),
          nsat:
            node.type === 'or_d'
              ? addOps(l.ops.nsat, r.ops.nsat, extra)
              : undefined
        },
        hasFreeVerify: false,
        satSize: maxCost(l.satSize, addCost(l.dissatSize, r.satSize)),
        dissatSize:
          node.type === 'or_d'
            ? addCost(l.dissatSize, r.dissatSize)
            : undefined,
        timelocks: combineTimelocks(l.timelocks, r.timelocks, { and: false })
      };
    }
    case 'or_i': {
      const l = node.left.ext;
      const r = node.right.ext;
      return {
        scriptSize: l.scriptSize + r.scriptSize + 3,
        ops: {
          count: l.ops.count + r.ops.count + 3,
          sat: addOps(
            maxOps(
              addOps(l.ops.sat, r.ops.count),
              addOps(r.ops.sat, l.ops.count)
            ),
            3
          ),
          nsat: addOps(
            maxOps(
              addOps(l.ops.nsat, r.ops.count),
              addOps(r.ops.nsat, l.ops.count)
            ),
            3
          )
        },
        hasFreeVerify: false,
        satSize: maxCost(
          addCost(l.satSize, PUSH_1),
          addCost(r.satSize, PUSH_0)
        ),
        dissatSize: maxCost(
          addCost(l.dissatSize, PUSH_1),
          addCost(r.dissatSize, PUSH_0)
        ),
        timelocks: combineTimelocks(l.timelocks, r.timelocks, { and: false })
      };
    }
    case 'thresh': {
      const n = node.subs.length;
      const exts = node.subs.map(sub => sub.ext);
      //n - 1 ADDs, <k> and EQUAL
      const extraOps = n;
      const timelocks = exts
        .map(ext => ext.timelocks)
        .reduce(
          (acc, t) => combineTimelocks(acc, t, { and: node.k > 1 }),
          NO_TIMELOCKS
        );
      const nsat = addOps(...exts.map(ext => ext.ops.nsat));
      const sat = thresholdOps(node.subs, node.k);
      return {
        scriptSize:
          exts.reduce((sum, ext) => sum + ext.scriptSize, 0) +
          (n - 1) +
          scriptNumSize(node.k) +
          1,
        ops: {
          count: exts.reduce((sum, ext) => sum + ext.ops.count, 0) + extraOps,
          sat: addOps(sat, extraOps),
          nsat: addOps(nsat, extraOps)
        },
        hasFreeVerify: true,
        satSize: thresholdSatCost(node.subs, node.k),
        dissatSize: addCost(...exts.map(ext => ext.dissatSize)),
        timelocks
      };
    }
  }
}
