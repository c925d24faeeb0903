// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { compareBytes } from '@scure/btc-signer/utils.js';
import { MiniscriptError } from '../errors.js';
import type { Tree } from '../expression.js';
import { parseNum, terminal } from '../expression.js';
import type { KeyParser, MiniscriptKey, Translator } from '../keys.js';
import { publicKeyBytes } from '../keys.js';
import type { ScriptContext } from '../miniscript/context.js';
import { Miniscript } from '../miniscript/miniscript.js';
import type { Satisfier } from '../satisfier.js';

/**
 * `sortedmulti(k,...)`: a k-of-n CHECKMULTISIG whose keys are sorted by
 * their serialization when encoded. The keys are displayed in the order
 * they were given.
 */
export class SortedMultiVec<Pk extends MiniscriptKey> {
  readonly k: number;
  readonly keys: Pk[];
  readonly ctx: ScriptContext;
  //unsorted multi, used for costs and context checks
  readonly #ms: Miniscript<Pk>;

  constructor(k: number, keys: Pk[], ctx: ScriptContext) {
    const ms = Miniscript.fromAst<Pk, Uint8Array>(
      { type: 'multi', k, keys },
      ctx
    );
    ms.checkTopLevel();
    ms.checkGlobalValidity();
    this.k = k;
    this.keys = keys;
    this.ctx = ctx;
    this.#ms = ms;
  }

  static fromTree<Pk extends MiniscriptKey>(
    tree: Tree,
    ctx: ScriptContext,
    parseKey: KeyParser<Pk>
  ): SortedMultiVec<Pk> {
    const [threshold, ...keys] = tree.args;
    if (threshold === undefined || keys.length === 0)
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: sortedmulti needs a threshold and at least one key`
      );
    return new SortedMultiVec(
      terminal(threshold, parseNum),
      keys.map(key => terminal(key, parseKey)),
      ctx
    );
  }

  /** The multi fragment with keys in their encoding order */
  sortedNode(): Miniscript<Pk> {
    const keys = [...this.keys].sort((a, b) =>
      compareBytes(publicKeyBytes(a), publicKeyBytes(b))
    );
    return Miniscript.fromAst<Pk, Uint8Array>(
      { type: 'multi', k: this.k, keys },
      this.ctx
    );
  }

  encode(): Uint8Array {
    return this.sortedNode().encode();
  }

  get scriptSize(): number {
    return this.#ms.scriptSize;
  }

  maxSatisfactionSize(): number {
    return this.#ms.maxSatisfactionSize();
  }

  maxSatisfactionWitnessElements(): number {
    return this.#ms.maxSatisfactionWitnessElements();
  }

  satisfy(satisfier: Satisfier): Uint8Array[] {
    return this.sortedNode().satisfy(satisfier);
  }

  sanityCheck(): void {
    this.#ms.sanityCheck();
  }

  forEachKey(predicate: (key: Pk) => boolean): boolean {
    return this.keys.every(key => predicate(key));
  }

  translatePk<Q extends MiniscriptKey>(
    translator: Translator<Pk, Q>
  ): SortedMultiVec<Q> {
    return new SortedMultiVec(
      this.k,
      this.keys.map(key => translator.pk(key)),
      this.ctx
    );
  }

  toString(): string {
    return `sortedmulti(${[this.k, ...this.keys].join(',')})`;
  }
}
