// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { concatBytes } from '@scure/btc-signer/utils.js';
import type { MiniscriptKey, Hash160Value } from '../keys.js';
import { hash160Bytes } from '../keys.js';
import type { Satisfier } from '../satisfier.js';
import type { Fragment } from './ast.js';
import type { ScriptContext } from './context.js';
import { keyBytes } from './encode.js';

/**
 * A witness stack (bottom first), or why there is none: `unavailable` when
 * the satisfier lacks a signature or preimage, `impossible` when no data
 * could ever satisfy the fragment.
 */
export type Witness = Uint8Array[] | 'unavailable' | 'impossible';

export interface Satisfaction {
  stack: Witness;
  /** Whether the witness holds a signature a third party cannot forge */
  hasSig: boolean;
}

type AnyFragment = Fragment<MiniscriptKey, Hash160Value>;

const EMPTY = new Uint8Array();
const ONE = Uint8Array.of(1);
//hash fragments check SIZE 32 before hashing
const HASH_DISSATISFACTION = new Uint8Array(32);

const impossible: Satisfaction = { stack: 'impossible', hasSig: false };

function witnessSize(stack: Uint8Array[]): number {
  return stack.reduce((size, element) => size + element.length, stack.length);
}

/** `bottom` below `top` */
function combine(bottom: Witness, top: Witness): Witness {
  if (bottom === 'impossible' || top === 'impossible') return 'impossible';
  if (bottom === 'unavailable' || top === 'unavailable') return 'unavailable';
  return [...bottom, ...top];
}

/** Stacks are cheaper than unavailable witnesses, which beat impossible ones */
function rank(witness: Witness): number {
  if (witness === 'impossible') return Number.MAX_SAFE_INTEGER;
  if (witness === 'unavailable') return Number.MAX_SAFE_INTEGER - 1;
  return witnessSize(witness);
}

const cheaper = (a: Witness, b: Witness): Witness =>
  rank(a) <= rank(b) ? a : b;

/**
 * Choice between two satisfactions of a fragment that a third party cannot
 * malleate: when neither needs a signature anyone could swap one for the
 * other, and a satisfaction without signatures is taken over one with.
 */
function minimum(a: Satisfaction, b: Satisfaction): Satisfaction {
  if (a.stack === 'impossible') return b;
  if (b.stack === 'impossible') return a;
  if (!a.hasSig && !b.hasSig) return { stack: 'unavailable', hasSig: false };
  if (a.hasSig && !b.hasSig) return b;
  if (!a.hasSig && b.hasSig) return a;
  return { stack: cheaper(a.stack, b.stack), hasSig: true };
}

/** The smallest available satisfaction */
function minimumMalleable(a: Satisfaction, b: Satisfaction): Satisfaction {
  if (typeof a.stack === 'string') return b;
  if (typeof b.stack === 'string') return a;
  return witnessSize(a.stack) <= witnessSize(b.stack) ? a : b;
}

class Solver {
  readonly #ctx: ScriptContext;
  readonly #satisfier: Satisfier;
  readonly #malleable: boolean;

  constructor(
    ctx: ScriptContext,
    satisfier: Satisfier,
    { malleable }: { malleable: boolean }
  ) {
    this.#ctx = ctx;
    this.#satisfier = satisfier;
    this.#malleable = malleable;
  }

  #min(a: Satisfaction, b: Satisfaction): Satisfaction {
    return this.#malleable ? minimumMalleable(a, b) : minimum(a, b);
  }

  #signature(key: MiniscriptKey): Witness {
    const sig = this.#satisfier.lookupEcdsaSig?.(key);
    if (sig === undefined) return 'unavailable';
    return [concatBytes(sig.signature, Uint8Array.of(sig.hashType))];
  }

  #pkhKey(fragmentHash: Hash160Value): MiniscriptKey | undefined {
    return this.#satisfier.lookupPkhPk?.(hash160Bytes(fragmentHash));
  }

  #keyPush(key: MiniscriptKey): Uint8Array[] {
    return [keyBytes(key, this.#ctx)];
  }

  satisfy(fragment: AnyFragment): Satisfaction {
    const node = fragment.node;
    switch (node.type) {
      case 'true':
        return { stack: [], hasSig: false };
      case 'false':
        return impossible;
      case 'pk_k':
        return { stack: this.#signature(node.key), hasSig: true };
      case 'pk_h':
        return {
          stack: combine(this.#signature(node.key), this.#keyPush(node.key)),
          hasSig: true
        };
      case 'raw_pkh': {
        const key = this.#pkhKey(node.hash);
        return {
          stack:
            key === undefined
              ? 'unavailable'
              : combine(this.#signature(key), this.#keyPush(key)),
          hasSig: true
        };
      }
      case 'after':
        return {
          stack: this.#satisfier.checkAfter?.(node.n) ? [] : 'impossible',
          hasSig: false
        };
      case 'older':
        return {
          stack: this.#satisfier.checkOlder?.(node.n) ? [] : 'impossible',
          hasSig: false
        };
      case 'sha256':
      case 'hash256':
      case 'ripemd160':
      case 'hash160': {
        const preimage = this.#satisfier.lookupPreimage?.(node.type, node.hash);
        return {
          stack: preimage === undefined ? 'unavailable' : [preimage],
          hasSig: false
        };
      }
      case 'alt':
      case 'swap':
      case 'check':
      case 'verify':
      case 'nonzero':
      case 'zeronotequal':
        return this.satisfy(node.sub);
      case 'dupif': {
        const sat = this.satisfy(node.sub);
        return { stack: combine(sat.stack, [ONE]), hasSig: sat.hasSig };
      }
      case 'and_v':
      case 'and_b': {
        const left = this.satisfy(node.left);
        const right = this.satisfy(node.right);
        return {
          stack: combine(right.stack, left.stack),
          hasSig: left.hasSig || right.hasSig
        };
      }
      case 'andor': {
        const aSat = this.satisfy(node.a);
        const aNsat = this.dissatisfy(node.a);
        const bSat = this.satisfy(node.b);
        const cSat = this.satisfy(node.c);
        return this.#min(
          {
            stack: combine(bSat.stack, aSat.stack),
            hasSig: aSat.hasSig || bSat.hasSig
          },
          {
            stack: combine(cSat.stack, aNsat.stack),
            hasSig: aNsat.hasSig || cSat.hasSig
          }
        );
      }
      case 'or_b': {
        const lSat = this.satisfy(node.left);
        const rSat = this.satisfy(node.right);
        const lNsat = this.dissatisfy(node.left);
        const rNsat = this.dissatisfy(node.right);
        return this.#min(
          { stack: combine(rSat.stack, lNsat.stack), hasSig: rSat.hasSig },
          { stack: combine(rNsat.stack, lSat.stack), hasSig: lSat.hasSig }
        );
      }
      case 'or_d':
      case 'or_c': {
        const lSat = this.satisfy(node.left);
        const rSat = this.satisfy(node.right);
        const lNsat = this.dissatisfy(node.left);
        return this.#min(lSat, {
          stack: combine(rSat.stack, lNsat.stack),
          hasSig: rSat.hasSig
        });
      }
      case 'or_i': {
        const lSat = this.satisfy(node.left);
        const rSat = this.satisfy(node.right);
        return this.#min(
          { stack: combine(lSat.stack, [ONE]), hasSig: lSat.hasSig },
          { stack: combine(rSat.stack, [EMPTY]), hasSig: rSat.hasSig }
        );
      }
      case 'thresh':
        return this.#malleable
          ? this.#threshMalleable(node.k, node.subs)
          : this.#thresh(node.k, node.subs);
      case 'multi': {
        //signatures in key order, above the CHECKMULTISIG dummy
        const sigs: Uint8Array[] = [];
        for (const key of node.keys) {
          const sig = this.#signature(key);
          if (typeof sig !== 'string') sigs.push(...sig);
          if (sigs.length === node.k) break;
        }
        return {
          stack: sigs.length === node.k ? [EMPTY, ...sigs] : 'unavailable',
          hasSig: true
        };
      }
      case 'multi_a': {
        //the first key is checked against the top of the stack
        const items: Uint8Array[] = [];
        let found = 0;
        for (const key of node.keys) {
          const sig = found < node.k ? this.#signature(key) : 'unavailable';
          if (typeof sig !== 'string') {
            items.push(...sig);
            found++;
          } else items.push(EMPTY);
        }
        return {
          stack: found === node.k ? items.reverse() : 'unavailable',
          hasSig: true
        };
      }
    }
  }

  dissatisfy(fragment: AnyFragment): Satisfaction {
    const node = fragment.node;
    switch (node.type) {
      case 'false':
        return { stack: [], hasSig: false };
      case 'true':
      case 'after':
      case 'older':
      case 'verify':
      case 'and_v':
      case 'or_c':
        return impossible;
      case 'pk_k':
        return { stack: [EMPTY], hasSig: false };
      case 'pk_h':
        return { stack: [EMPTY, ...this.#keyPush(node.key)], hasSig: false };
      case 'raw_pkh': {
        const key = this.#pkhKey(node.hash);
        return {
          stack: key === undefined ? 'unavailable' : [EMPTY, ...this.#keyPush(key)],
          hasSig: false
        };
      }
      case 'sha256':
      case 'hash256':
      case 'ripemd160':
      case 'hash160':
        return { stack: [HASH_DISSATISFACTION], hasSig: false };
      case 'alt':
      case 'swap':
      case 'check':
      case 'zeronotequal':
        return this.dissatisfy(node.sub);
      case 'dupif':
      case 'nonzero':
        return { stack: [EMPTY], hasSig: false };
      case 'and_b':
      case 'or_b':
      case 'or_d': {
        const lNsat = this.dissatisfy(node.left);
        const rNsat = this.dissatisfy(node.right);
        return {
          stack: combine(rNsat.stack, lNsat.stack),
          hasSig: lNsat.hasSig || rNsat.hasSig
        };
      }
      case 'or_i': {
        const lNsat = this.dissatisfy(node.left);
        const rNsat = this.dissatisfy(node.right);
        return this.#min(
          { stack: combine(lNsat.stack, [ONE]), hasSig: lNsat.hasSig },
          { stack: combine(rNsat.stack, [EMPTY]), hasSig: rNsat.hasSig }
        );
      }
      case 'andor': {
        const aNsat = this.dissatisfy(node.a);
        const cNsat = this.dissatisfy(node.c);
        return {
          stack: combine(cNsat.stack, aNsat.stack),
          hasSig: aNsat.hasSig || cNsat.hasSig
        };
      }
      case 'thresh':
        return node.subs.reduce<Satisfaction>(
          (acc, sub) => {
            const nsat = this.dissatisfy(sub);
            return {
              stack: combine(nsat.stack, acc.stack),
              hasSig: acc.hasSig || nsat.hasSig
            };
          },
          { stack: [], hasSig: false }
        );
      case 'multi':
        return {
          stack: Array.from({ length: node.k + 1 }, () => EMPTY),
          hasSig: false
        };
      case 'multi_a':
        return {
          stack: Array.from({ length: node.keys.length }, () => EMPTY),
          hasSig: false
        };
    }
  }

  /**
   * Satisfies the `k` subs whose satisfaction costs least over their
   * dissatisfaction, taking those without signatures first. Fails when a
   * further sub could be satisfied without a signature, since a third party
   * could then pick another set.
   */
  #thresh(k: number, subs: AnyFragment[]): Satisfaction {
    const sats = subs.map(sub => this.satisfy(sub));
    const chosen = subs.map(sub => this.dissatisfy(sub));
    const weight = (i: number): number => {
      const sat = sats[i]?.stack ?? 'impossible';
      const nsat = chosen[i]?.stack ?? 'impossible';
      if (typeof sat === 'string') return Number.MAX_SAFE_INTEGER;
      if (typeof nsat === 'string') return Number.MIN_SAFE_INTEGER;
      return witnessSize(sat) - witnessSize(nsat);
    };
    const order = subs
      .map((_, i) => i)
      .sort((i, j) => {
        const a = sats[i];
        const b = sats[j];
        if (a === undefined || b === undefined) return 0;
        const impossibleOrder =
          Number(a.stack === 'impossible') - Number(b.stack === 'impossible');
        if (impossibleOrder !== 0) return impossibleOrder;
        const sigOrder = Number(a.hasSig) - Number(b.hasSig);
        if (sigOrder !== 0) return sigOrder;
        return weight(i) - weight(j);
      });
    for (const i of order.slice(0, k)) {
      const sat = sats[i];
      if (sat !== undefined) chosen[i] = sat;
    }
    const last = sats[order[k - 1] ?? -1];
    if (last === undefined || last.stack === 'impossible') return impossible;
    const next = sats[order[k] ?? -1];
    if (next !== undefined && !next.hasSig && next.stack !== 'impossible')
      return { stack: 'unavailable', hasSig: false };
    return chosen.reduce<Satisfaction>(
      (acc, sat) => ({
        stack: combine(sat.stack, acc.stack),
        hasSig: acc.hasSig || sat.hasSig
      }),
      { stack: [], hasSig: false }
    );
  }

  /** Smallest witness with exactly `k` satisfied subs */
  #threshMalleable(k: number, subs: AnyFragment[]): Satisfaction {
    //best[j]: smallest witness of the subs seen so far with j satisfied
    let best: Satisfaction[] = [{ stack: [], hasSig: false }];
    for (const sub of subs) {
      const sat = this.satisfy(sub);
      const nsat = this.dissatisfy(sub);
      const next: Satisfaction[] = [];
      for (let j = 0; j <= Math.min(best.length, k); j++) {
        const skip = best[j];
        const take = best[j - 1];
        const options: Satisfaction[] = [];
        if (skip !== undefined)
          options.push({
            stack: combine(nsat.stack, skip.stack),
            hasSig: skip.hasSig || nsat.hasSig
          });
        if (take !== undefined)
          options.push({
            stack: combine(sat.stack, take.stack),
            hasSig: take.hasSig || sat.hasSig
          });
        next.push(options.reduce(minimumMalleable, impossible));
      }
      best = next;
    }
    return best[k] ?? impossible;
  }
}

/**
 * Witness of `fragment` built from its syntax tree. Unlike the expanded
 * satisfier this does not need a sane miniscript: with `malleable` set the
 * smallest witness is returned even if a third party could alter it.
 */
export function solveFragment(
  fragment: AnyFragment,
  ctx: ScriptContext,
  satisfier: Satisfier,
  options: { malleable: boolean }
): Witness {
  return new Solver(ctx, satisfier, options).satisfy(fragment).stack;
}
