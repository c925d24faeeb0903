// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { sha256 } from '@noble/hashes/sha2.js';
import { MiniscriptError } from '../errors.js';
import type { Tree } from '../expression.js';
import { terminal } from '../expression.js';
import type { KeyParser, MiniscriptKey, Translator } from '../keys.js';
import { pubkeyHash160, publicKeyBytes } from '../keys.js';
import type { ScriptContext } from '../miniscript/context.js';
import { Segwitv0 } from '../miniscript/context.js';
import { Miniscript } from '../miniscript/miniscript.js';
import { topLevelFromTree } from '../miniscript/parse.js';
import type { Network } from '../networks.js';
import type { Satisfier } from '../satisfier.js';
import { varintEncodingLength } from '../scriptUtils.js';
import { SortedMultiVec } from './sortedmulti.js';
import type {
  Descriptor,
  DescriptorOptions,
  Satisfaction
} from './traits.js';
import {
  defaultNetwork,
  encodeAddress,
  expectTopLevel,
  p2pkhScript,
  parseDescriptorTree,
  requireSig,
  withChecksum
} from './traits.js';

/**
 * Pay to witness public key hash. Uncompressed keys cannot be used in
 * segwit outputs.
 */
export class Wpkh<Pk extends MiniscriptKey> implements Descriptor<Pk> {
  readonly type = 'wpkh' as const;
  readonly pk: Pk;
  readonly elements: boolean;

  constructor(pk: Pk, { elements = false } = {}) {
    if (pk.isUncompressed())
      throw new MiniscriptError(
        'UncompressedPubkey',
        `Error: uncompressed key ${pk.toString()} not allowed in wpkh`
      );
    this.pk = pk;
    this.elements = elements;
  }

  static fromTree<Pk extends MiniscriptKey>(
    tree: Tree,
    parseKey: KeyParser<Pk>,
    { elements = false } = {}
  ): Wpkh<Pk> {
    const [key] = expectTopLevel(tree, 'wpkh', 1);
    if (key === undefined)
      throw new MiniscriptError('BadDescriptor', `Error: wpkh needs a key`);
    return new Wpkh(terminal(key, parseKey), { elements });
  }

  static fromString<Pk extends MiniscriptKey>(
    descriptor: string,
    parseKey: KeyParser<Pk>,
    options: DescriptorOptions = {}
  ): Wpkh<Pk> {
    const { tree, elements } = parseDescriptorTree(descriptor, options);
    return Wpkh.fromTree(tree, parseKey, { elements });
  }

  sanityCheck(): void {
    if (this.pk.isUncompressed())
      throw new MiniscriptError(
        'UncompressedPubkey',
        `Error: uncompressed key ${this.pk.toString()} not allowed in wpkh`
      );
  }

  getScriptPubKey(): Uint8Array {
    return btc.OutScript.encode({ type: 'wpkh', hash: pubkeyHash160(this.pk) });
  }

  getUnsignedScriptSig(): Uint8Array {
    return new Uint8Array();
  }

  //segwit v0 key spends sign the equivalent p2pkh script
  getExplicitScript(): Uint8Array {
    return p2pkhScript(this.pk);
  }

  getScriptCode(): Uint8Array {
    return this.getExplicitScript();
  }

  getAddress(network: Network = defaultNetwork(this.elements)): string {
    return encodeAddress(
      { type: 'wpkh', hash: pubkeyHash160(this.pk) },
      network
    );
  }

  getSatisfaction(satisfier: Satisfier): Satisfaction {
    const sig = requireSig(satisfier, this.pk);
    return {
      witness: [sig, publicKeyBytes(this.pk)],
      scriptSig: new Uint8Array()
    };
  }

  getSatisfactionMalleable(satisfier: Satisfier): Satisfaction {
    return this.getSatisfaction(satisfier);
  }

  maxSatisfactionWeight(): number {
    return 4 + 1 + 73 + 34;
  }

  forEachKey(predicate: (key: Pk) => boolean): boolean {
    return predicate(this.pk);
  }

  translatePk<Q extends MiniscriptKey>(translator: Translator<Pk, Q>): Wpkh<Q> {
    return new Wpkh(translator.pk(this.pk), { elements: this.elements });
  }

  /** Body of the descriptor, without prefix or checksum */
  describe(): string {
    return `wpkh(${this.pk.toString()})`;
  }

  toString(): string {
    return withChecksum(this.describe(), this.elements);
  }
}

/** The script committed to by a wsh or sh output */
export type ScriptInner<Pk extends MiniscriptKey> =
  | Miniscript<Pk>
  | SortedMultiVec<Pk>;

export function satisfyInner<Pk extends MiniscriptKey>(
  inner: ScriptInner<Pk>,
  satisfier: Satisfier,
  { malleable }: { malleable: boolean }
): Uint8Array[] {
  //multi has no malleable satisfactions
  if (inner instanceof SortedMultiVec || !malleable)
    return inner.satisfy(satisfier);
  return inner.satisfyMalleable(satisfier);
}

export function translateInner<
  Pk extends MiniscriptKey,
  Q extends MiniscriptKey
>(
  inner: ScriptInner<Pk>,
  translator: Translator<Pk, Q>
): ScriptInner<Q> {
  if (inner instanceof SortedMultiVec) return inner.translatePk(translator);
  return inner.translatePk(translator);
}

/**
 * Parses the argument of `wsh(...)` or `sh(...)`: either a `sortedmulti`
 * or a miniscript of context `ctx`.
 */
export function innerFromTree<Pk extends MiniscriptKey>(
  tree: Tree,
  ctx: ScriptContext,
  parseKey: KeyParser<Pk>
): ScriptInner<Pk> {
  return tree.name === 'sortedmulti'
    ? SortedMultiVec.fromTree(tree, ctx, parseKey)
    : topLevelFromTree(tree, ctx, parseKey);
}

/**
 * Size of the witness of the largest satisfaction of a witness script,
 * script and length prefixes included.
 */
export function witnessScriptWeight<Pk extends MiniscriptKey>(
  inner: ScriptInner<Pk>
): number {
  const scriptSize = inner.scriptSize;
  const elements = inner.maxSatisfactionWitnessElements();
  return (
    varintEncodingLength(scriptSize) +
    scriptSize +
    varintEncodingLength(elements) +
    inner.maxSatisfactionSize()
  );
}

/**
 * Pay to witness script hash.
 */
export class Wsh<Pk extends MiniscriptKey> implements Descriptor<Pk> {
  readonly type = 'wsh' as const;
  readonly inner: ScriptInner<Pk>;
  readonly elements: boolean;

  constructor(inner: ScriptInner<Pk>, { elements = false } = {}) {
    if (inner.ctx.name !== 'Segwitv0')
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: wsh descriptors need a Segwitv0 script, got ${inner.ctx.name}`
      );
    if (inner instanceof Miniscript) inner.checkTopLevel();
    this.inner = inner;
    this.elements = elements;
  }

  static fromTree<Pk extends MiniscriptKey>(
    tree: Tree,
    parseKey: KeyParser<Pk>,
    { elements = false } = {}
  ): Wsh<Pk> {
    const [script] = expectTopLevel(tree, 'wsh', 1);
    if (script === undefined)
      throw new MiniscriptError('BadDescriptor', `Error: wsh needs a script`);
    return new Wsh(innerFromTree(script, Segwitv0, parseKey), { elements });
  }

  static fromString<Pk extends MiniscriptKey>(
    descriptor: string,
    parseKey: KeyParser<Pk>,
    options: DescriptorOptions = {}
  ): Wsh<Pk> {
    const { tree, elements } = parseDescriptorTree(descriptor, options);
    return Wsh.fromTree(tree, parseKey, { elements });
  }

  sanityCheck(): void {
    this.inner.sanityCheck();
  }

  getWitnessScript(): Uint8Array {
    return this.inner.encode();
  }

  getScriptPubKey(): Uint8Array {
    return btc.OutScript.encode({
      type: 'wsh',
      hash: sha256(this.getWitnessScript())
    });
  }

  getUnsignedScriptSig(): Uint8Array {
    return new Uint8Array();
  }

  getExplicitScript(): Uint8Array {
    return this.getWitnessScript();
  }

  getScriptCode(): Uint8Array {
    return this.getWitnessScript();
  }

  getAddress(network: Network = defaultNetwork(this.elements)): string {
    return encodeAddress(
      { type: 'wsh', hash: sha256(this.getWitnessScript()) },
      network
    );
  }

  getSatisfaction(satisfier: Satisfier): Satisfaction {
    return this.#satisfaction(satisfier, { malleable: false });
  }

  getSatisfactionMalleable(satisfier: Satisfier): Satisfaction {
    return this.#satisfaction(satisfier, { malleable: true });
  }

  #satisfaction(
    satisfier: Satisfier,
    options: { malleable: boolean }
  ): Satisfaction {
    const stack = satisfyInner(this.inner, satisfier, options);
    return {
      witness: [...stack, this.getWitnessScript()],
      scriptSig: new Uint8Array()
    };
  }

  maxSatisfactionWeight(): number {
    //4 for the scriptSig length byte
    return 4 + witnessScriptWeight(this.inner);
  }

  forEachKey(predicate: (key: Pk) => boolean): boolean {
    return this.inner.forEachKey(predicate);
  }

  translatePk<Q extends MiniscriptKey>(translator: Translator<Pk, Q>): Wsh<Q> {
    return new Wsh(translateInner(this.inner, translator), {
      elements: this.elements
    });
  }

  describe(): string {
    return `wsh(${this.inner.toString()})`;
  }

  toString(): string {
    return withChecksum(this.describe(), this.elements);
  }
}
