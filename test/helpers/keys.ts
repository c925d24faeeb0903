// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { secp256k1 } from '@noble/curves/secp256k1.js';
import { hex } from '@scure/base';
import type { EcdsaSig, Satisfier } from '../../src/satisfier.js';
import type { MiniscriptKey } from '../../src/keys.js';

/** Public key of the placeholder private key `scalar` */
export function pubkeyHex(scalar: bigint, compressed = true): string {
  return secp256k1.Point.BASE.multiply(scalar).toHex(compressed);
}

export function xOnlyHex(scalar: bigint): string {
  return pubkeyHex(scalar).slice(2);
}

export const A = pubkeyHex(1n);
export const B = pubkeyHex(2n);
export const C = pubkeyHex(3n);
export const A_UNCOMPRESSED = pubkeyHex(1n, false);

/** DER-shaped placeholder signature; nothing verifies it */
export function fakeSig(tag: number, length = 71): Uint8Array {
  return new Uint8Array(length).fill(tag);
}

/** Satisfier that signs for the keys in `sigs` with SIGHASH_ALL */
export function sigSatisfier(sigs: Record<string, Uint8Array>): Satisfier {
  return {
    lookupEcdsaSig(key: MiniscriptKey): EcdsaSig | undefined {
      const signature = sigs[key.toString()];
      return signature === undefined ? undefined : { signature, hashType: 1 };
    }
  };
}

/** Single byte push followed by `data`, for short scriptSigs */
export function push(data: Uint8Array): Uint8Array {
  return Uint8Array.of(data.length, ...data);
}

export const fromHex = hex.decode;
export const toHex = hex.encode;
