// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import type { MiniscriptKey } from './keys.js';
import type { HashFragment } from './miniscript/ast.js';

export interface EcdsaSig {
  /** DER encoded signature, without the sighash type byte */
  signature: Uint8Array;
  hashType: number;
}

/** Outpoint being spent */
export interface Outpoint {
  /** In internal byte order */
  txid: Uint8Array;
  vout: number;
}

/**
 * Source of the data needed to build witnesses: signatures, hash
 * preimages, timelock checks and, for covenant descriptors, the components
 * of the Elements sighash preimage.
 *
 * Every lookup is optional; a missing one is treated as data that is not
 * available.
 */
export interface Satisfier {
  lookupEcdsaSig?(key: MiniscriptKey): EcdsaSig | undefined;
  /** Key behind a hash160 found in a raw pkh fragment */
  lookupPkhPk?(hash: Uint8Array): MiniscriptKey | undefined;
  lookupPreimage?(type: HashFragment, hash: Uint8Array): Uint8Array | undefined;
  /** Whether a relative timelock of `n` is satisfied by the spend */
  checkOlder?(n: number): boolean;
  /** Whether an absolute timelock of `n` is satisfied by the spend */
  checkAfter?(n: number): boolean;

  //Sighash preimage components, in the order they are hashed
  lookupNVersion?(): number | undefined;
  lookupHashPrevouts?(): Uint8Array | undefined;
  lookupHashSequence?(): Uint8Array | undefined;
  lookupHashIssuances?(): Uint8Array | undefined;
  lookupOutpoint?(): Outpoint | undefined;
  lookupScriptCode?(): Uint8Array | undefined;
  /** Serialized confidential value of the spent output */
  lookupValue?(): Uint8Array | undefined;
  lookupNSequence?(): number | undefined;
  /** Serialized outputs of the spending transaction */
  lookupOutputs?(): Uint8Array[] | undefined;
  lookupNLocktime?(): number | undefined;
  lookupSighashU32?(): number | undefined;
}
