// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { hash160 } from '@scure/btc-signer/utils.js';
import { MiniscriptError } from '../errors.js';
import type { Tree } from '../expression.js';
import type { KeyParser, MiniscriptKey, Translator } from '../keys.js';
import { Legacy } from '../miniscript/context.js';
import { Miniscript } from '../miniscript/miniscript.js';
import type { Network } from '../networks.js';
import type { Satisfier } from '../satisfier.js';
import {
  ScriptBuilder,
  pushOpcodeSize,
  varintEncodingLength,
  witnessToScriptSig
} from '../scriptUtils.js';
import type { ScriptInner } from './segwitv0.js';
import {
  Wpkh,
  Wsh,
  innerFromTree,
  satisfyInner,
  translateInner,
  witnessScriptWeight
} from './segwitv0.js';
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
  withChecksum
} from './traits.js';

/**
 * Pay to script hash: a legacy redeem script, or a nested segwit v0 output
 * (`sh(wpkh(...))`, `sh(wsh(...))`).
 */
export class Sh<Pk extends MiniscriptKey> implements Descriptor<Pk> {
  readonly type = 'sh' as const;
  readonly inner: Wpkh<Pk> | Wsh<Pk> | ScriptInner<Pk>;
  readonly elements: boolean;

  constructor(
    inner: Wpkh<Pk> | Wsh<Pk> | ScriptInner<Pk>,
    { elements = false } = {}
  ) {
    if (!(inner instanceof Wpkh || inner instanceof Wsh)) {
      if (inner.ctx.name !== 'Legacy')
        throw new MiniscriptError(
          'BadDescriptor',
          `Error: sh descriptors need a Legacy script, got ${inner.ctx.name}`
        );
      if (inner instanceof Miniscript) inner.checkTopLevel();
    }
    this.inner = inner;
    this.elements = elements;
  }

  static fromTree<Pk extends MiniscriptKey>(
    tree: Tree,
    parseKey: KeyParser<Pk>,
    { elements = false } = {}
  ): Sh<Pk> {
    const [script] = expectTopLevel(tree, 'sh', 1);
    if (script === undefined)
      throw new MiniscriptError('BadDescriptor', `Error: sh needs a script`);
    //nested descriptors share the prefix of the outer one
    if (script.name === 'wsh')
      return new Sh(Wsh.fromTree(script, parseKey, { elements }), {
        elements
      });
    if (script.name === 'wpkh')
      return new Sh(Wpkh.fromTree(script, parseKey, { elements }), {
        elements
      });
    return new Sh(innerFromTree(script, Legacy, parseKey), { elements });
  }

  static fromString<Pk extends MiniscriptKey>(
    descriptor: string,
    parseKey: KeyParser<Pk>,
    options: DescriptorOptions = {}
  ): Sh<Pk> {
    const { tree, elements } = parseDescriptorTree(descriptor, options);
    return Sh.fromTree(tree, parseKey, { elements });
  }

  sanityCheck(): void {
    this.inner.sanityCheck();
  }

  /** The script whose hash160 the output commits to */
  getRedeemScript(): Uint8Array {
    return this.inner instanceof Wpkh || this.inner instanceof Wsh
      ? this.inner.getScriptPubKey()
      : this.inner.encode();
  }

  getScriptPubKey(): Uint8Array {
    return btc.OutScript.encode({
      type: 'sh',
      hash: hash160(this.getRedeemScript())
    });
  }

  getUnsignedScriptSig(): Uint8Array {
    if (this.inner instanceof Wpkh || this.inner instanceof Wsh)
      return new ScriptBuilder().pushSlice(this.getRedeemScript()).toBytes();
    return new Uint8Array();
  }

  getExplicitScript(): Uint8Array {
    return this.inner instanceof Wpkh || this.inner instanceof Wsh
      ? this.inner.getExplicitScript()
      : this.getRedeemScript();
  }

  getScriptCode(): Uint8Array {
    return this.getExplicitScript();
  }

  getAddress(network: Network = defaultNetwork(this.elements)): string {
    return encodeAddress(
      { type: 'sh', hash: hash160(this.getRedeemScript()) },
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
    const inner = this.inner;
    if (inner instanceof Wpkh || inner instanceof Wsh) {
      const { witness } = options.malleable
        ? inner.getSatisfactionMalleable(satisfier)
        : inner.getSatisfaction(satisfier);
      return { witness, scriptSig: this.getUnsignedScriptSig() };
    }
    const stack = satisfyInner(inner, satisfier, options);
    return {
      witness: [],
      scriptSig: witnessToScriptSig([...stack, this.getRedeemScript()])
    };
  }

  maxSatisfactionWeight(): number {
    const inner = this.inner;
    //sh(wsh): 4 * (scriptSig length byte + push of the 34 byte program)
    if (inner instanceof Wsh) return 4 * 36 + witnessScriptWeight(inner.inner);
    //sh(wpkh): 4 * (scriptSig length byte + push of the 22 byte program)
    if (inner instanceof Wpkh) return 4 * 24 + 1 + 73 + 34;
    const scriptSize = inner.scriptSize;
    const scriptSigLength =
      scriptSize + pushOpcodeSize(scriptSize) + inner.maxSatisfactionSize();
    return 4 * (varintEncodingLength(scriptSigLength) + scriptSigLength);
  }

  forEachKey(predicate: (key: Pk) => boolean): boolean {
    return this.inner.forEachKey(predicate);
  }

  translatePk<Q extends MiniscriptKey>(translator: Translator<Pk, Q>): Sh<Q> {
    const inner = this.inner;
    const options = { elements: this.elements };
    if (inner instanceof Wpkh)
      return new Sh(inner.translatePk(translator), options);
    if (inner instanceof Wsh)
      return new Sh(inner.translatePk(translator), options);
    return new Sh(translateInner(inner, translator), options);
  }

  describe(): string {
    const inner = this.inner;
    return `sh(${
      inner instanceof Wpkh || inner instanceof Wsh
        ? inner.describe()
        : inner.toString()
    })`;
  }

  toString(): string {
    return withChecksum(this.describe(), this.elements);
  }
}
