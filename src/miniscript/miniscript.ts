// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import memoize from 'lodash.memoize';
import { MiniscriptError } from '../errors.js';
import type { MiniscriptKey, Hash160Value, Translator } from '../keys.js';
import { ScriptBuilder } from '../scriptUtils.js';
import type { Fragment, Node } from './ast.js';
import { directKeys, iterFragments, nodeToString } from './ast.js';
import type { ScriptContext } from './context.js';
import { encodeFragment } from './encode.js';
import type { Satisfier } from '../satisfier.js';
import { satisfyFragment } from './satisfy.js';
import type { ExtData, Type } from './types.js';
import { extData, typeCheck } from './types.js';

/**
 * A type checked miniscript fragment bound to a script context.
 *
 * Instances are immutable: key translation and context changes build new
 * trees.
 */
export class Miniscript<
  Pk extends MiniscriptKey,
  H extends Hash160Value = Uint8Array
> implements Fragment<Pk, H>
{
  readonly node: Node<Pk, H>;
  readonly ty: Type;
  readonly ext: ExtData;
  readonly ctx: ScriptContext;
  readonly #encode: () => Uint8Array;

  private constructor(
    node: Node<Pk, H>,
    ctx: ScriptContext,
    ty: Type,
    ext: ExtData
  ) {
    this.node = node;
    this.ctx = ctx;
    this.ty = ty;
    this.ext = ext;
    this.#encode = memoize(() =>
      encodeFragment(this, this.ctx, new ScriptBuilder()).toBytes()
    );
  }

  /**
   * Type checks `node`, whose children are already type checked, and
   * computes its script size and satisfaction costs under `ctx`.
   */
  static fromAst<Pk extends MiniscriptKey, H extends Hash160Value>(
    node: Node<Pk, H>,
    ctx: ScriptContext
  ): Miniscript<Pk, H> {
    const ty = typeCheck(node);
    return new Miniscript(node, ctx, ty, extData(node, ctx));
  }

  toString(): string {
    return nodeToString(this.node);
  }

  /** This fragment and all its descendants, parents first */
  iter(): Generator<Fragment<Pk, H>> {
    return iterFragments<Pk, H>(this);
  }

  /** Every key, in script order. Raw key hashes are not keys. */
  keys(): Pk[] {
    return [...this.iter()].flatMap(fragment => directKeys(fragment.node));
  }

  /**
   * Calls `predicate` on every key until it returns false.
   * Returns whether all keys passed.
   */
  forEachKey(predicate: (key: Pk) => boolean): boolean {
    for (const fragment of this.iter())
      for (const key of directKeys(fragment.node))
        if (!predicate(key)) return false;
    return true;
  }

  /**
   * Rebuilds the miniscript with every key and raw key hash substituted.
   * Pass `ctx` to rebuild it under a different script context.
   */
  translatePk<Q extends MiniscriptKey, HQ extends Hash160Value>(
    translator: Translator<Pk, Q, H, HQ>,
    ctx: ScriptContext = this.ctx
  ): Miniscript<Q, HQ> {
    return translateFragment(this, translator, ctx);
  }

  /** Script of the miniscript; a fresh copy on every call */
  encode(): Uint8Array {
    return this.#encode().slice();
  }

  get scriptSize(): number {
    return this.ext.scriptSize;
  }

  /**
   * Witness elements (scriptSig pushes for Legacy and Bare) of the largest
   * satisfaction. For segwit contexts the witness script is included.
   */
  maxSatisfactionWitnessElements(): number {
    const elements = this.ctx.maxSatisfactionWitnessElements(this);
    if (elements === undefined)
      throw new MiniscriptError(
        'ImpossibleSatisfaction',
        `Error: ${this.toString()} cannot be satisfied`
      );
    return elements;
  }

  /**
   * Bytes of witness (scriptSig for Legacy and Bare) taken by the largest
   * satisfaction, excluding the script itself.
   */
  maxSatisfactionSize(): number {
    const size = this.ctx.maxSatisfactionSize(this);
    if (size === undefined)
      throw new MiniscriptError(
        'ImpossibleSatisfaction',
        `Error: ${this.toString()} cannot be satisfied`
      );
    return size;
  }

  /**
   * Checks that the fragment can be the whole script: it must be of type B
   * and pass the top level rules of its context.
   */
  checkTopLevel(): void {
    this.checkBaseType();
    this.ctx.otherTopLevelChecks(this);
  }

  /** A whole script must leave a single true or false on the stack */
  checkBaseType(): void {
    if (this.ty.corr.base !== 'B')
      throw new MiniscriptError(
        'NonTopLevel',
        `Error: ${this.toString()} is ${this.ty.corr.base}, a top level miniscript must be B`
      );
  }

  /** Consensus limits and key rules of the context */
  checkGlobalValidity(): void {
    this.ctx.checkGlobalConsensusValidity(this);
    this.ctx.checkLocalConsensusValidity(this);
  }

  hasMixedTimelocks(): boolean {
    return this.ext.timelocks.containsCombination;
  }

  hasRepeatedKeys(): boolean {
    const seen = new Set<string>();
    return !this.forEachKey(key => {
      const id = key.toString();
      if (seen.has(id)) return false;
      seen.add(id);
      return true;
    });
  }

  /**
   * Rejects miniscripts that are valid but unsafe to use: spendable without
   * a signature, malleable, over the standardness limits of the context,
   * mixing height and time locks or reusing keys.
   */
  sanityCheck(): void {
    if (!this.ty.mall.s)
      throw new MiniscriptError(
        'SigNotRequired',
        `Error: ${this.toString()} can be spent without a signature`
      );
    if (!this.ty.mall.m)
      throw new MiniscriptError(
        'Malleable',
        `Error: ${this.toString()} has malleable satisfactions`
      );
    this.checkGlobalValidity();
    this.ctx.checkGlobalPolicyValidity(this);
    this.ctx.checkLocalPolicyValidity(this);
    if (this.hasMixedTimelocks())
      throw new MiniscriptError(
        'MixedTimelocks',
        `Error: ${this.toString()} mixes height and time locks`
      );
    if (this.hasRepeatedKeys())
      throw new MiniscriptError(
        'RepeatedKeys',
        `Error: ${this.toString()} contains duplicate public keys`
      );
  }

  /**
   * Witness stack that satisfies the miniscript, smallest first among the
   * non-malleable solutions whose timelocks the satisfier accepts.
   * The script itself is not included.
   */
  satisfy(satisfier: Satisfier): Uint8Array[] {
    return satisfyFragment(this, this.ctx, satisfier, { malleable: false });
  }

  /**
   * Same as {@link Miniscript.satisfy} but also considers satisfactions a
   * third party could modify.
   */
  satisfyMalleable(satisfier: Satisfier): Uint8Array[] {
    return satisfyFragment(this, this.ctx, satisfier, { malleable: true });
  }
}

function translateFragment<
  P extends MiniscriptKey,
  HP extends Hash160Value,
  Q extends MiniscriptKey,
  HQ extends Hash160Value
>(
  fragment: Fragment<P, HP>,
  translator: Translator<P, Q, HP, HQ>,
  ctx: ScriptContext
): Miniscript<Q, HQ> {
  const sub = (child: Fragment<P, HP>) =>
    translateFragment(child, translator, ctx);
  const node = fragment.node;
  let translated: Node<Q, HQ>;
  switch (node.type) {
    case 'true':
    case 'false':
      translated = { type: node.type };
      break;
    case 'pk_k':
    case 'pk_h':
      translated = { type: node.type, key: translator.pk(node.key) };
      break;
    case 'raw_pkh':
      translated = { type: 'raw_pkh', hash: translator.pkh(node.hash) };
      break;
    case 'after':
    case 'older':
      translated = { type: node.type, n: node.n };
      break;
    case 'sha256':
    case 'hash256':
    case 'ripemd160':
    case 'hash160':
      translated = { type: node.type, hash: node.hash };
      break;
    case 'alt':
    case 'swap':
    case 'check':
    case 'dupif':
    case 'verify':
    case 'nonzero':
    case 'zeronotequal':
      translated = { type: node.type, sub: sub(node.sub) };
      break;
    case 'and_v':
    case 'and_b':
    case 'or_b':
    case 'or_d':
    case 'or_c':
    case 'or_i':
      translated = {
        type: node.type,
        left: sub(node.left),
        right: sub(node.right)
      };
      break;
    case 'andor':
      translated = {
        type: 'andor',
        a: sub(node.a),
        b: sub(node.b),
        c: sub(node.c)
      };
      break;
    case 'thresh':
      translated = { type: 'thresh', k: node.k, subs: node.subs.map(sub) };
      break;
    case 'multi':
    case 'multi_a':
      translated = {
        type: node.type,
        k: node.k,
        keys: node.keys.map(key => translator.pk(key))
      };
      break;
  }
  return Miniscript.fromAst(translated, ctx);
}
