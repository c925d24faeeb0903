// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { MiniscriptError } from '../errors.js';
import type { Tree } from '../expression.js';
import { terminal } from '../expression.js';
import type { KeyParser, MiniscriptKey, Translator } from '../keys.js';
import { pubkeyHash160, publicKeyBytes } from '../keys.js';
import { Bare as BareCtx } from '../miniscript/context.js';
import type { Miniscript } from '../miniscript/miniscript.js';
import { topLevelFromTree } from '../miniscript/parse.js';
import type { Network } from '../networks.js';
import type { Satisfier } from '../satisfier.js';
import { varintEncodingLength, witnessToScriptSig } from '../scriptUtils.js';
import type {
  Descriptor,
  DescriptorOptions,
  Satisfaction
} from './traits.js';
import {
  defaultNetwork,
  encodeAddress,
  expectTopLevel,
  parseDescriptorTree,
  requireSig,
  withChecksum
} from './traits.js';

/**
 * A raw script output: the miniscript is the script pubkey itself.
 */
export class Bare<Pk extends MiniscriptKey> implements Descriptor<Pk> {
  readonly type = 'bare' as const;
  readonly ms: Miniscript<Pk>;
  readonly elements: boolean;

  constructor(ms: Miniscript<Pk>, { elements = false } = {}) {
    if (ms.ctx.name !== 'Bare')
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: bare descriptors need a Bare miniscript, got ${ms.ctx.name}`
      );
    ms.checkTopLevel();
    this.ms = ms;
    this.elements = elements;
  }

  static fromTree<Pk extends MiniscriptKey>(
    tree: Tree,
    parseKey: KeyParser<Pk>,
    { elements = false } = {}
  ): Bare<Pk> {
    return new Bare(topLevelFromTree(tree, BareCtx, parseKey), { elements });
  }

  static fromString<Pk extends MiniscriptKey>(
    descriptor: string,
    parseKey: KeyParser<Pk>,
    options: DescriptorOptions = {}
  ): Bare<Pk> {
    const { tree, elements } = parseDescriptorTree(descriptor, options);
    return Bare.fromTree(tree, parseKey, { elements });
  }

  sanityCheck(): void {
    this.ms.sanityCheck();
  }

  getScriptPubKey(): Uint8Array {
    return this.ms.encode();
  }

  getUnsignedScriptSig(): Uint8Array {
    return new Uint8Array();
  }

  getExplicitScript(): Uint8Array {
    return this.getScriptPubKey();
  }

  getScriptCode(): Uint8Array {
    return this.getScriptPubKey();
  }

  getAddress(_network?: Network): string {
    throw new MiniscriptError(
      'BareDescriptorAddr',
      `Error: bare descriptor ${this.toString()} has no address`
    );
  }

  getSatisfaction(satisfier: Satisfier): Satisfaction {
    const stack = this.ms.satisfy(satisfier);
    return { witness: [], scriptSig: witnessToScriptSig(stack) };
  }

  getSatisfactionMalleable(satisfier: Satisfier): Satisfaction {
    const stack = this.ms.satisfyMalleable(satisfier);
    return { witness: [], scriptSig: witnessToScriptSig(stack) };
  }

  maxSatisfactionWeight(): number {
    const scriptSigLength = this.ms.maxSatisfactionSize();
    return 4 * (varintEncodingLength(scriptSigLength) + scriptSigLength);
  }

  forEachKey(predicate: (key: Pk) => boolean): boolean {
    return this.ms.forEachKey(predicate);
  }

  translatePk<Q extends MiniscriptKey>(translator: Translator<Pk, Q>): Bare<Q> {
    return new Bare(this.ms.translatePk(translator), {
      elements: this.elements
    });
  }

  toString(): string {
    return withChecksum(this.ms.toString(), this.elements);
  }
}

/**
 * Pay to public key hash. No miniscript is involved: the spend pushes a
 * signature and the key.
 */
export class Pkh<Pk extends MiniscriptKey> implements Descriptor<Pk> {
  readonly type = 'pkh' as const;
  readonly pk: Pk;
  readonly elements: boolean;

  constructor(pk: Pk, { elements = false } = {}) {
    this.pk = pk;
    this.elements = elements;
  }

  static fromTree<Pk extends MiniscriptKey>(
    tree: Tree,
    parseKey: KeyParser<Pk>,
    { elements = false } = {}
  ): Pkh<Pk> {
    const [key] = expectTopLevel(tree, 'pkh', 1);
    if (key === undefined)
      throw new MiniscriptError('BadDescriptor', `Error: pkh needs a key`);
    return new Pkh(terminal(key, parseKey), { elements });
  }

  static fromString<Pk extends MiniscriptKey>(
    descriptor: string,
    parseKey: KeyParser<Pk>,
    options: DescriptorOptions = {}
  ): Pkh<Pk> {
    const { tree, elements } = parseDescriptorTree(descriptor, options);
    return Pkh.fromTree(tree, parseKey, { elements });
  }

  //A single key cannot be insane
  sanityCheck(): void {}

  getScriptPubKey(): Uint8Array {
    return btc.OutScript.encode({ type: 'pkh', hash: pubkeyHash160(this.pk) });
  }

  getUnsignedScriptSig(): Uint8Array {
    return new Uint8Array();
  }

  getExplicitScript(): Uint8Array {
    return this.getScriptPubKey();
  }

  getScriptCode(): Uint8Array {
    return this.getScriptPubKey();
  }

  getAddress(network: Network = defaultNetwork(this.elements)): string {
    return encodeAddress(
      { type: 'pkh', hash: pubkeyHash160(this.pk) },
      network
    );
  }

  getSatisfaction(satisfier: Satisfier): Satisfaction {
    const sig = requireSig(satisfier, this.pk);
    return {
      witness: [],
      scriptSig: witnessToScriptSig([sig, publicKeyBytes(this.pk)])
    };
  }

  getSatisfactionMalleable(satisfier: Satisfier): Satisfaction {
    return this.getSatisfaction(satisfier);
  }

  maxSatisfactionWeight(): number {
    return 4 * (1 + 73 + (this.pk.isUncompressed() ? 66 : 34));
  }

  forEachKey(predicate: (key: Pk) => boolean): boolean {
    return predicate(this.pk);
  }

  translatePk<Q extends MiniscriptKey>(translator: Translator<Pk, Q>): Pkh<Q> {
    return new Pkh(translator.pk(this.pk), { elements: this.elements });
  }

  toString(): string {
    return withChecksum(`pkh(${this.pk.toString()})`, this.elements);
  }
}
