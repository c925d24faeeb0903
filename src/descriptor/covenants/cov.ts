// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { sha256 } from '@noble/hashes/sha2.js';
import { concatBytes } from '@scure/btc-signer/utils.js';
import { CovError, MiniscriptError } from '../../errors.js';
import type { Tree } from '../../expression.js';
import { parseTree, terminal } from '../../expression.js';
import { verifyChecksum } from '../../checksum.js';
import type {
  KeyParser,
  MiniscriptKey,
  PublicKey,
  Translator
} from '../../keys.js';
import { publicKeyBytes } from '../../keys.js';
import {
  MAX_OPS_PER_SCRIPT,
  MAX_SCRIPT_SIZE,
  MAX_STANDARD_P2WSH_SCRIPT_SIZE,
  Segwitv0
} from '../../miniscript/context.js';
import { encodeFragment } from '../../miniscript/encode.js';
import type { Miniscript } from '../../miniscript/miniscript.js';
import { miniscriptFromTree } from '../../miniscript/parse.js';
import type { Network } from '../../networks.js';
import { networks } from '../../networks.js';
import type { Satisfier } from '../../satisfier.js';
import {
  ScriptBuilder,
  u32LE,
  varintEncode,
  varintEncodingLength
} from '../../scriptUtils.js';
import type {
  Descriptor,
  DescriptorOptions,
  Satisfaction
} from '../traits.js';
import { ELEMENTS_PREFIX, encodeAddress, withChecksum } from '../traits.js';
import {
  COV_SCRIPT_OPS,
  COV_SCRIPT_SIZE,
  covScriptCode,
  parseCovComponents,
  pushCovVerify
} from './script.js';

const NAME = `${ELEMENTS_PREFIX}covwsh`;

//Largest serialization of the sighash items plus the covenant signature
const MAX_COV_WITNESS_SIZE = 275;
//Signature and the 11 sighash items
const COV_WITNESS_ELEMENTS = 12;

const hash256 = (data: Uint8Array) => sha256(sha256(data));

/**
 * A segwit v0 output whose script ends with a covenant check: a signature
 * by `pk` over the sighash items found in the witness, verified with
 * CHECKSIGFROMSTACK. The items are concatenated in the order of the Elements
 * segwit v0 sighash, so the covenant constrains the spending transaction.
 *
 * Keys inside `ms` sign the whole script ({@link getScriptCode}); the
 * covenant key signs only the part after OP_CODESEPARATOR
 * ({@link getCovScriptCode}).
 */
export class CovenantDescriptor<Pk extends MiniscriptKey>
  implements Descriptor<Pk>
{
  readonly type = 'covwsh' as const;
  readonly pk: Pk;
  readonly ms: Miniscript<Pk>;
  readonly elements = true;

  constructor(pk: Pk, ms: Miniscript<Pk>) {
    if (ms.ctx.name !== 'Segwitv0')
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: covenants need a Segwitv0 miniscript, got ${ms.ctx.name}`
      );
    const opsSat = ms.ext.ops.sat;
    if (opsSat === undefined)
      throw new MiniscriptError(
        'ImpossibleSatisfaction',
        `Error: ${ms.toString()} cannot be satisfied`
      );
    const freeVerify = ms.ext.hasFreeVerify ? 1 : 0;
    if (opsSat + COV_SCRIPT_OPS - freeVerify > MAX_OPS_PER_SCRIPT)
      throw new MiniscriptError(
        'ImpossibleSatisfaction',
        `Error: ${ms.toString()} with the covenant check exceeds ${MAX_OPS_PER_SCRIPT} ops`
      );
    if (ms.scriptSize + COV_SCRIPT_SIZE - freeVerify > MAX_SCRIPT_SIZE)
      throw new MiniscriptError(
        'ScriptSizeTooLarge',
        `Error: ${ms.toString()} with the covenant check exceeds ${MAX_SCRIPT_SIZE} bytes`
      );
    this.pk = pk;
    this.ms = ms;
  }

  static fromTree<Pk extends MiniscriptKey>(
    tree: Tree,
    parseKey: KeyParser<Pk>
  ): CovenantDescriptor<Pk> {
    const [key, script] = tree.args;
    if (
      tree.name !== NAME ||
      tree.args.length !== 2 ||
      key === undefined ||
      script === undefined
    )
      throw new MiniscriptError(
        'Unexpected',
        `${tree.name}(${tree.args.length} args) while parsing ${NAME} descriptor`
      );
    const ms = miniscriptFromTree(script, Segwitv0, parseKey);
    ms.checkTopLevel();
    return new CovenantDescriptor(terminal(key, parseKey), ms);
  }

  static fromString<Pk extends MiniscriptKey>(
    descriptor: string,
    parseKey: KeyParser<Pk>,
    { checksumRequired = false }: DescriptorOptions = {}
  ): CovenantDescriptor<Pk> {
    const body = verifyChecksum(descriptor, { checksumRequired });
    return CovenantDescriptor.fromTree(parseTree(body), parseKey);
  }

  /**
   * Parses a covenant witness script without checking its miniscript for
   * safety. See {@link CovenantDescriptor.parse}.
   */
  static parseInsane(script: Uint8Array): CovenantDescriptor<PublicKey> {
    const { pk, ms } = parseCovComponents(script, Segwitv0);
    return new CovenantDescriptor(pk, ms);
  }

  /** Parses a covenant witness script, rejecting unsafe miniscripts */
  static parse(script: Uint8Array): CovenantDescriptor<PublicKey> {
    const cov = CovenantDescriptor.parseInsane(script);
    cov.ms.sanityCheck();
    return cov;
  }

  #freeVerify(): number {
    return this.ms.ext.hasFreeVerify ? 1 : 0;
  }

  sanityCheck(): void {
    this.ms.sanityCheck();
    if (
      this.ms.scriptSize + COV_SCRIPT_SIZE - this.#freeVerify() >
      MAX_STANDARD_P2WSH_SCRIPT_SIZE
    )
      throw new MiniscriptError(
        'ScriptSizeTooLarge',
        `Error: ${this.toString()} exceeds the standard witness script size`
      );
  }

  encode(): Uint8Array {
    const builder = encodeFragment(this.ms, this.ms.ctx, new ScriptBuilder());
    return pushCovVerify(builder, publicKeyBytes(this.pk)).toBytes();
  }

  getScriptPubKey(): Uint8Array {
    return btc.OutScript.encode({ type: 'wsh', hash: sha256(this.encode()) });
  }

  getUnsignedScriptSig(): Uint8Array {
    return new Uint8Array();
  }

  getExplicitScript(): Uint8Array {
    return this.encode();
  }

  /** Script code for keys inside the miniscript */
  getScriptCode(): Uint8Array {
    return this.encode();
  }

  /** Script code for the covenant key */
  getCovScriptCode(): Uint8Array {
    return covScriptCode();
  }

  getAddress(network: Network = networks.liquid): string {
    return encodeAddress({ type: 'wsh', hash: sha256(this.encode()) }, network);
  }

  /**
   * The covenant signature followed by the sighash items, in the order the
   * script concatenates them:
   * `[sig, nVersion, hashPrevouts, hashSequence, hashIssuances, outpoint,
   * scriptCode, value, nSequence, hashOutputs, nLocktime, sighashType]`.
   *
   * `hashOutputs` is computed from `lookupOutputs`.
   */
  covWitness(satisfier: Satisfier): Uint8Array[] {
    const item = <T>(value: T | undefined, index: number, name: string): T => {
      if (value === undefined)
        throw new CovError(
          'MissingSighashItem',
          `Error: missing sighash item ${index} (${name})`,
          index
        );
      return value;
    };
    const nVersion = item(satisfier.lookupNVersion?.(), 1, 'nVersion');
    const hashPrevouts = item(
      satisfier.lookupHashPrevouts?.(),
      2,
      'hashPrevouts'
    );
    const hashSequence = item(
      satisfier.lookupHashSequence?.(),
      3,
      'hashSequence'
    );
    const hashIssuances = item(
      satisfier.lookupHashIssuances?.(),
      4,
      'hashIssuances'
    );
    const outpoint = item(satisfier.lookupOutpoint?.(), 5, 'outpoint');
    const scriptCode = item(satisfier.lookupScriptCode?.(), 6, 'scriptCode');
    const value = item(satisfier.lookupValue?.(), 7, 'value');
    const nSequence = item(satisfier.lookupNSequence?.(), 8, 'nSequence');
    const outputs = item(satisfier.lookupOutputs?.(), 9, 'outputs');
    const nLocktime = item(satisfier.lookupNLocktime?.(), 10, 'nLocktime');
    const sighashType = item(
      satisfier.lookupSighashU32?.(),
      11,
      'sighashType'
    );

    const sig = satisfier.lookupEcdsaSig?.(this.pk);
    if (sig === undefined)
      throw new CovError(
        'MissingCovSignature',
        `Error: missing covenant signature for ${this.pk.toString()}`
      );
    if (sig.hashType !== sighashType)
      throw new CovError(
        'CovenantSighashTypeMismatch',
        `Error: signature hash type ${sig.hashType} does not match sighash type ${sighashType}`
      );

    return [
      //the script appends the hash type byte itself
      sig.signature,
      u32LE(nVersion),
      hashPrevouts,
      hashSequence,
      hashIssuances,
      concatBytes(outpoint.txid, u32LE(outpoint.vout)),
      concatBytes(varintEncode(scriptCode.length), scriptCode),
      value,
      u32LE(nSequence),
      hash256(concatBytes(...outputs)),
      u32LE(nLocktime),
      u32LE(sighashType)
    ];
  }

  getSatisfaction(satisfier: Satisfier): Satisfaction {
    return {
      witness: [
        ...this.covWitness(satisfier),
        ...this.ms.satisfy(satisfier),
        this.encode()
      ],
      scriptSig: new Uint8Array()
    };
  }

  getSatisfactionMalleable(satisfier: Satisfier): Satisfaction {
    return {
      witness: [
        ...this.covWitness(satisfier),
        ...this.ms.satisfyMalleable(satisfier),
        this.encode()
      ],
      scriptSig: new Uint8Array()
    };
  }

  maxSatisfactionWeight(): number {
    const scriptSize =
      this.ms.scriptSize + COV_SCRIPT_SIZE - this.#freeVerify();
    const elements =
      this.ms.maxSatisfactionWitnessElements() + COV_WITNESS_ELEMENTS;
    return (
      4 +
      varintEncodingLength(scriptSize) +
      scriptSize +
      varintEncodingLength(elements) +
      this.ms.maxSatisfactionSize() +
      MAX_COV_WITNESS_SIZE
    );
  }

  forEachKey(predicate: (key: Pk) => boolean): boolean {
    return predicate(this.pk) && this.ms.forEachKey(predicate);
  }

  translatePk<Q extends MiniscriptKey>(
    translator: Translator<Pk, Q>
  ): CovenantDescriptor<Q> {
    return new CovenantDescriptor(
      translator.pk(this.pk),
      this.ms.translatePk(translator)
    );
  }

  toString(): string {
    //the prefix is part of the name
    return withChecksum(
      `covwsh(${this.pk.toString()},${this.ms.toString()})`,
      true
    );
  }
}
