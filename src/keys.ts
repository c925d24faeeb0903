// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { secp256k1 } from '@noble/curves/secp256k1.js';
import { hash160, equalBytes } from '@scure/btc-signer/utils.js';
import { hex } from '@scure/base';
import { MiniscriptError } from './errors.js';

/**
 * Anything that can stand for a key inside a miniscript or a descriptor.
 * Keys are compared by their string form.
 */
export interface MiniscriptKey {
  toString(): string;
  isUncompressed(): boolean;
  isXOnly(): boolean;
}

/**
 * A key that can be serialized into a script.
 */
export interface ToPublicKey extends MiniscriptKey {
  /** 33 or 65 bytes for full keys, 32 bytes for x-only keys */
  toBytes(): Uint8Array;
}

export function isToPublicKey(key: MiniscriptKey): key is ToPublicKey {
  return 'toBytes' in key && typeof key.toBytes === 'function';
}

/** Serialized key, throwing for keys that only exist as names */
export function publicKeyBytes(key: MiniscriptKey): Uint8Array {
  if (!isToPublicKey(key))
    throw new MiniscriptError(
      'KeyNotConvertible',
      `Error: key ${key.toString()} cannot be converted to a public key`
    );
  return key.toBytes();
}

export function pubkeyHash160(key: MiniscriptKey): Uint8Array {
  return hash160(publicKeyBytes(key));
}

function isValidPoint(bytes: Uint8Array): boolean {
  try {
    secp256k1.Point.fromHex(hex.encode(bytes));
    return true;
  } catch {
    return false;
  }
}

/**
 * A full secp256k1 key: 33 bytes compressed or 65 bytes uncompressed.
 */
export class PublicKey implements ToPublicKey {
  readonly kind = 'full' as const;
  readonly #bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.#bytes = bytes;
  }

  static fromBytes(bytes: Uint8Array): PublicKey {
    const prefix = bytes[0];
    const shapeOk =
      (bytes.length === 33 && (prefix === 0x02 || prefix === 0x03)) ||
      (bytes.length === 65 && prefix === 0x04);
    if (!shapeOk || !isValidPoint(bytes))
      throw new MiniscriptError(
        'BadKey',
        `Error: invalid public key ${hex.encode(bytes)}`
      );
    return new PublicKey(Uint8Array.from(bytes));
  }

  static fromHex(pubkey: string): PublicKey {
    let bytes: Uint8Array;
    try {
      bytes = hex.decode(pubkey);
    } catch {
      throw new MiniscriptError('BadKey', `Error: invalid public key ${pubkey}`);
    }
    return PublicKey.fromBytes(bytes);
  }

  get compressed(): boolean {
    return this.#bytes.length === 33;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.#bytes);
  }

  /** Drops the parity byte of a compressed key */
  toXOnly(): XOnlyPublicKey {
    if (!this.compressed)
      throw new MiniscriptError(
        'UncompressedPubkey',
        `Error: uncompressed key ${this.toString()} has no x-only form`
      );
    return XOnlyPublicKey.fromBytes(this.#bytes.slice(1));
  }

  isUncompressed(): boolean {
    return !this.compressed;
  }

  isXOnly(): boolean {
    return false;
  }

  equals(other: MiniscriptKey): boolean {
    return other instanceof PublicKey && equalBytes(this.#bytes, other.#bytes);
  }

  toString(): string {
    return hex.encode(this.#bytes);
  }
}

/**
 * A BIP340 key: the 32-byte x coordinate of a point with even y.
 */
export class XOnlyPublicKey implements ToPublicKey {
  readonly kind = 'xonly' as const;
  readonly #bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.#bytes = bytes;
  }

  static fromBytes(bytes: Uint8Array): XOnlyPublicKey {
    if (bytes.length !== 32 || !isValidPoint(Uint8Array.of(0x02, ...bytes)))
      throw new MiniscriptError(
        'BadKey',
        `Error: invalid x-only public key ${hex.encode(bytes)}`
      );
    return new XOnlyPublicKey(Uint8Array.from(bytes));
  }

  static fromHex(pubkey: string): XOnlyPublicKey {
    let bytes: Uint8Array;
    try {
      bytes = hex.decode(pubkey);
    } catch {
      throw new MiniscriptError(
        'BadKey',
        `Error: invalid x-only public key ${pubkey}`
      );
    }
    return XOnlyPublicKey.fromBytes(bytes);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.#bytes);
  }

  isUncompressed(): boolean {
    return false;
  }

  isXOnly(): boolean {
    return true;
  }

  equals(other: MiniscriptKey): boolean {
    return (
      other instanceof XOnlyPublicKey && equalBytes(this.#bytes, other.#bytes)
    );
  }

  toString(): string {
    return hex.encode(this.#bytes);
  }
}

/**
 * Key form used after a script has been lifted out of its context by the
 * interpreter: either a full key (legacy and segwit v0) or an x-only key
 * (tapscript).
 */
export type BitcoinKey = PublicKey | XOnlyPublicKey;

/**
 * A hash160 found in a decoded script, tagged with the kind of key it must
 * be matched against.
 */
export interface TypedHash160 {
  kind: 'full' | 'xonly';
  hash: Uint8Array;
}

/** Hash types a raw pkh fragment can carry */
export type Hash160Value = Uint8Array | TypedHash160;

export function hash160Bytes(hash: Hash160Value): Uint8Array {
  return hash instanceof Uint8Array ? hash : hash.hash;
}

/**
 * A key known only by name, as in `pk(A)`. Useful for analysing policies
 * before real keys are substituted with {@link Translator}s.
 */
export class KeyName implements MiniscriptKey {
  readonly name: string;
  constructor(name: string) {
    if (!/^[A-Za-z0-9_@.-]+$/.test(name))
      throw new MiniscriptError('BadKey', `Error: invalid key name ${name}`);
    this.name = name;
  }
  isUncompressed(): boolean {
    return false;
  }
  isXOnly(): boolean {
    return false;
  }
  toString(): string {
    return this.name;
  }
}

/** Parses the textual form of a key */
export type KeyParser<Pk extends MiniscriptKey> = (key: string) => Pk;

export const parsePublicKey: KeyParser<PublicKey> = key =>
  PublicKey.fromHex(key);
export const parseXOnlyPublicKey: KeyParser<XOnlyPublicKey> = key =>
  XOnlyPublicKey.fromHex(key);
export const parseKeyName: KeyParser<KeyName> = key => new KeyName(key);

/**
 * Key substitution applied to every key and every raw key hash of a
 * miniscript or descriptor.
 */
export interface Translator<
  P extends MiniscriptKey,
  Q extends MiniscriptKey,
  HP extends Hash160Value = Uint8Array,
  HQ extends Hash160Value = Uint8Array
> {
  pk(key: P): Q;
  pkh(hash: HP): HQ;
}
