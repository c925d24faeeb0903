// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
const { OP } = btc;
import { hex } from '@scure/base';
import { MiniscriptError } from '../errors.js';
import type { MiniscriptKey } from '../keys.js';
import type { HashFragment, Node } from './ast.js';
import type { ScriptContext } from './context.js';
import type { Token } from './lex.js';
import { lex } from './lex.js';
import { Miniscript } from './miniscript.js';

/** Turns a key push into a key, throwing for pushes that are not keys */
export type KeyDecoder<Pk extends MiniscriptKey> = (bytes: Uint8Array) => Pk;

const OP_NAMES: ReadonlyMap<unknown, string> = new Map(
  Object.entries(OP).map(([name, code]) => [code, name])
);

const HASH_OPCODES: ReadonlyMap<number, HashFragment> = new Map([
  [OP.SHA256, 'sha256'],
  [OP.HASH256, 'hash256'],
  [OP.RIPEMD160, 'ripemd160'],
  [OP.HASH160, 'hash160']
]);

//Tokens an and_v sequence never extends past
const SEQUENCE_BOUNDARIES: ReadonlySet<number> = new Set([
  OP.IF,
  OP.NOTIF,
  OP.ELSE,
  OP.TOALTSTACK,
  OP.SWAP
]);

/**
 * Reads a lexed script backwards, from its last token, rebuilding the
 * fragments that encode to it.
 */
class Decoder<Pk extends MiniscriptKey> {
  readonly #tokens: Token[];
  //tokens[0 .. #pos - 1] are still to be read
  #pos: number;
  readonly #ctx: ScriptContext;
  readonly #decodeKey: KeyDecoder<Pk>;

  constructor(tokens: Token[], ctx: ScriptContext, decodeKey: KeyDecoder<Pk>) {
    this.#tokens = tokens;
    this.#pos = tokens.length;
    this.#ctx = ctx;
    this.#decodeKey = decodeKey;
  }

  get done(): boolean {
    return this.#pos === 0;
  }

  #peek(offset = 0): Token | undefined {
    return this.#tokens[this.#pos - 1 - offset];
  }

  #isOp(op: number, offset = 0): boolean {
    const token = this.#peek(offset);
    return token?.type === 'op' && token.op === op;
  }

  #unexpected(what: string): never {
    throw new MiniscriptError(
      'UnexpectedToken',
      `Error: expected ${what} at script position ${this.#pos}`
    );
  }

  #next(): Token {
    const token = this.#peek();
    if (token === undefined) return this.#unexpected('more script');
    this.#pos--;
    return token;
  }

  #expectOp(op: number): void {
    if (!this.#isOp(op)) this.#unexpected(`opcode ${OP_NAMES.get(op) ?? op}`);
    this.#pos--;
  }

  #expectNum(): number {
    const token = this.#next();
    if (token.type !== 'num') return this.#unexpected('a number');
    return token.n;
  }

  #expectPush(length?: number): Uint8Array {
    const token = this.#next();
    if (token.type !== 'push' || (length !== undefined && token.data.length !== length))
      return this.#unexpected(`a push of ${length ?? 'some'} bytes`);
    return token.data;
  }

  #build(node: Node<Pk, Uint8Array>): Miniscript<Pk, Uint8Array> {
    return Miniscript.fromAst(node, this.#ctx);
  }

  /** Right-nested and_v chain ending at the current position */
  parseSeq(): Miniscript<Pk, Uint8Array> {
    let right = this.parseOne();
    for (;;) {
      const token = this.#peek();
      if (
        token === undefined ||
        (token.type === 'op' && SEQUENCE_BOUNDARIES.has(token.op))
      )
        return right;
      const left = this.parseOne();
      right = this.#build({ type: 'and_v', left, right });
    }
  }

  /** W expressions: a:X or s:X */
  parseW(): Miniscript<Pk, Uint8Array> {
    if (this.#isOp(OP.FROMALTSTACK)) {
      this.#pos--;
      const sub = this.parseSeq();
      this.#expectOp(OP.TOALTSTACK);
      return this.#build({ type: 'alt', sub });
    }
    const sub = this.parseSeq();
    this.#expectOp(OP.SWAP);
    return this.#build({ type: 'swap', sub });
  }

  parseOne(): Miniscript<Pk, Uint8Array> {
    const token = this.#next();
    if (token.type === 'push')
      return this.#build({ type: 'pk_k', key: this.#decodeKey(token.data) });
    if (token.type === 'num') {
      if (token.n === 0) return this.#build({ type: 'false' });
      if (token.n === 1) return this.#build({ type: 'true' });
      return this.#unexpected('a fragment');
    }
    switch (token.op) {
      case OP.CHECKSIG:
        return this.#build({ type: 'check', sub: this.parseOne() });
      case OP.VERIFY:
        return this.#parseVerify();
      case OP.EQUAL:
        return this.#parseEqual();
      case OP.CHECKMULTISIG:
        return this.#parseMulti();
      case OP.NUMEQUAL:
        return this.#parseMultiA();
      case OP.CHECKSEQUENCEVERIFY:
        return this.#build({ type: 'older', n: this.#expectNum() });
      case OP.CHECKLOCKTIMEVERIFY:
        return this.#build({ type: 'after', n: this.#expectNum() });
      case OP.FROMALTSTACK: {
        const sub = this.parseSeq();
        this.#expectOp(OP.TOALTSTACK);
        return this.#build({ type: 'alt', sub });
      }
      case OP.BOOLAND:
      case OP.BOOLOR: {
        const right = this.parseW();
        const left = this.parseOne();
        return this.#build({
          type: token.op === OP.BOOLAND ? 'and_b' : 'or_b',
          left,
          right
        });
      }
      case OP['0NOTEQUAL']:
        return this.#build({ type: 'zeronotequal', sub: this.parseOne() });
      case OP.ENDIF:
        return this.#parseEndIf();
      default:
        return this.#unexpected('a fragment');
    }
  }

  //DUP HASH160 <20> EQUAL VERIFY, or v:X
  #parseVerify(): Miniscript<Pk, Uint8Array> {
    const hash = this.#peek(1);
    if (
      this.#isOp(OP.EQUAL) &&
      hash?.type === 'push' &&
      hash.data.length === 20 &&
      this.#isOp(OP.HASH160, 2) &&
      this.#isOp(OP.DUP, 3)
    ) {
      this.#pos -= 4;
      return this.#build({ type: 'raw_pkh', hash: hash.data });
    }
    return this.#build({ type: 'verify', sub: this.parseOne() });
  }

  //SIZE <32> EQUAL VERIFY HASHOP <h> EQUAL, or a thresh
  #parseEqual(): Miniscript<Pk, Uint8Array> {
    const hash = this.#peek();
    const hashOp = this.#peek(1);
    const size = this.#peek(4);
    const hashType =
      hashOp?.type === 'op' ? HASH_OPCODES.get(hashOp.op) : undefined;
    if (
      hash?.type === 'push' &&
      hashType !== undefined &&
      hash.data.length ===
        (hashType === 'sha256' || hashType === 'hash256' ? 32 : 20) &&
      this.#isOp(OP.VERIFY, 2) &&
      this.#isOp(OP.EQUAL, 3) &&
      size?.type === 'num' &&
      size.n === 32 &&
      this.#isOp(OP.SIZE, 5)
    ) {
      this.#pos -= 6;
      return this.#build({ type: hashType, hash: hash.data });
    }
    const k = this.#expectNum();
    const subs: Miniscript<Pk, Uint8Array>[] = [];
    while (this.#isOp(OP.ADD)) {
      this.#pos--;
      subs.unshift(this.parseW());
    }
    subs.unshift(this.parseOne());
    return this.#build({ type: 'thresh', k, subs });
  }

  //<k> <key>... <n> CHECKMULTISIG
  #parseMulti(): Miniscript<Pk, Uint8Array> {
    const n = this.#expectNum();
    const keys: Pk[] = [];
    for (let i = 0; i < n; i++) keys.unshift(this.#decodeKey(this.#expectPush()));
    const k = this.#expectNum();
    return this.#build({ type: 'multi', k, keys });
  }

  //<key> CHECKSIG (<key> CHECKSIGADD)... <k> NUMEQUAL
  #parseMultiA(): Miniscript<Pk, Uint8Array> {
    const k = this.#expectNum();
    const keys: Pk[] = [];
    while (this.#isOp(OP.CHECKSIGADD)) {
      this.#pos--;
      keys.unshift(this.#decodeKey(this.#expectPush()));
    }
    this.#expectOp(OP.CHECKSIG);
    keys.unshift(this.#decodeKey(this.#expectPush()));
    return this.#build({ type: 'multi_a', k, keys });
  }

  #parseEndIf(): Miniscript<Pk, Uint8Array> {
    const last = this.parseSeq();
    if (this.#isOp(OP.ELSE)) {
      this.#pos--;
      const first = this.parseSeq();
      const token = this.#next();
      if (token.type === 'op' && token.op === OP.IF)
        return this.#build({ type: 'or_i', left: first, right: last });
      if (token.type === 'op' && token.op === OP.NOTIF) {
        const a = this.parseOne();
        return this.#build({ type: 'andor', a, b: last, c: first });
      }
      return this.#unexpected('IF or NOTIF');
    }
    const token = this.#next();
    if (token.type === 'op' && token.op === OP.IF) {
      if (this.#isOp(OP.DUP)) {
        this.#pos--;
        return this.#build({ type: 'dupif', sub: last });
      }
      if (this.#isOp(OP['0NOTEQUAL']) && this.#isOp(OP.SIZE, 1)) {
        this.#pos -= 2;
        return this.#build({ type: 'nonzero', sub: last });
      }
      return this.#unexpected('DUP or SIZE 0NOTEQUAL before IF');
    }
    if (token.type === 'op' && token.op === OP.NOTIF) {
      if (this.#isOp(OP.IFDUP)) {
        this.#pos--;
        return this.#build({ type: 'or_d', left: this.parseOne(), right: last });
      }
      return this.#build({ type: 'or_c', left: this.parseOne(), right: last });
    }
    return this.#unexpected('IF or NOTIF');
  }
}

/**
 * Rebuilds the miniscript a script encodes. Only type rules are enforced:
 * callers decide which context and sanity checks apply.
 */
export function decodeTokens<Pk extends MiniscriptKey>(
  tokens: Token[],
  ctx: ScriptContext,
  decodeKey: KeyDecoder<Pk>
): Miniscript<Pk, Uint8Array> {
  const decoder = new Decoder(tokens, ctx, decodeKey);
  const ms = decoder.parseSeq();
  if (!decoder.done)
    throw new MiniscriptError(
      'Trailing',
      `Error: ${ms.toString()} is preceded by script it does not account for`
    );
  return ms;
}

function decodeScript<Pk extends MiniscriptKey>(
  script: Uint8Array,
  ctx: ScriptContext,
  decodeKey: KeyDecoder<Pk>
): Miniscript<Pk, Uint8Array> {
  try {
    return decodeTokens(lex(script), ctx, decodeKey);
  } catch (err) {
    if (err instanceof MiniscriptError && err.kind === 'UnexpectedToken')
      throw new MiniscriptError(
        'UnexpectedToken',
        `${err.message} of ${hex.encode(script)}`
      );
    throw err;
  }
}

/**
 * Parses `script` as a miniscript of context `ctx`, checking that it can be
 * used at the top level of a script and respects the consensus limits of
 * `ctx`.
 */
export function decodeMiniscript<Pk extends MiniscriptKey>(
  script: Uint8Array,
  ctx: ScriptContext,
  decodeKey: KeyDecoder<Pk>
): Miniscript<Pk, Uint8Array> {
  const ms = decodeScript(script, ctx, decodeKey);
  ms.checkTopLevel();
  ms.checkGlobalValidity();
  return ms;
}

/**
 * Like {@link decodeMiniscript}, but skips the standardness rules of the
 * context: a script already on chain is interpreted even if it would not
 * be relayed today. It must still be of type B and within consensus limits.
 */
export function decodeMiniscriptInsane<Pk extends MiniscriptKey>(
  script: Uint8Array,
  ctx: ScriptContext,
  decodeKey: KeyDecoder<Pk>
): Miniscript<Pk, Uint8Array> {
  const ms = decodeScript(script, ctx, decodeKey);
  ms.checkBaseType();
  ms.checkGlobalValidity();
  return ms;
}
