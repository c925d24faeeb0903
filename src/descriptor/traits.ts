// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { concatBytes } from '@scure/btc-signer/utils.js';
import { DescriptorChecksum, verifyChecksum } from '../checksum.js';
import { MiniscriptError } from '../errors.js';
import type { Tree } from '../expression.js';
import { parseTree } from '../expression.js';
import type { MiniscriptKey } from '../keys.js';
import { pubkeyHash160 } from '../keys.js';
import type { Network } from '../networks.js';
import { networks, toBtcSignerNetwork } from '../networks.js';
import type { EcdsaSig, Satisfier } from '../satisfier.js';

/** Namespace prefix of Elements descriptors */
export const ELEMENTS_PREFIX = 'el';

export interface Satisfaction {
  /** Witness stack, bottom first. Empty for legacy spends. */
  witness: Uint8Array[];
  scriptSig: Uint8Array;
}

export interface DescriptorOptions {
  /** Reject descriptor strings without a `#checksum` tag */
  checksumRequired?: boolean;
}

/**
 * Operations shared by every output descriptor.
 */
export interface Descriptor<Pk extends MiniscriptKey> {
  /** Whether the descriptor was written with the `el` prefix */
  readonly elements: boolean;
  /**
   * Checks the standardness and safety rules that parsing does not enforce
   * (see {@link Miniscript.sanityCheck}).
   */
  sanityCheck(): void;
  getScriptPubKey(): Uint8Array;
  /** The scriptSig of the spend before any signature is added */
  getUnsignedScriptSig(): Uint8Array;
  /**
   * The script being evaluated: the redeem or witness script for wrapped
   * descriptors, the script pubkey otherwise.
   */
  getExplicitScript(): Uint8Array;
  /** The script code used to compute segwit v0 and legacy sighashes */
  getScriptCode(): Uint8Array;
  getAddress(network?: Network): string;
  getSatisfaction(satisfier: Satisfier): Satisfaction;
  /** Same as getSatisfaction, but malleable witnesses are acceptable */
  getSatisfactionMalleable(satisfier: Satisfier): Satisfaction;
  /**
   * Upper bound of the weight of the scriptSig and witness of a spend,
   * including their length prefixes.
   */
  maxSatisfactionWeight(): number;
  /**
   * Calls `predicate` on every key until it returns false.
   * Returns whether all keys passed.
   */
  forEachKey(predicate: (key: Pk) => boolean): boolean;
  /** The descriptor string with its checksum */
  toString(): string;
}

/**
 * Parses a descriptor string: the checksum tag is verified (and required
 * when `checksumRequired` is set) and the `el` prefix, if present, split off
 * the top level name.
 */
export function parseDescriptorTree(
  descriptor: string,
  { checksumRequired = false }: DescriptorOptions = {}
): { tree: Tree; elements: boolean } {
  const body = verifyChecksum(descriptor, { checksumRequired });
  return splitElementsPrefix(parseTree(body));
}

export function splitElementsPrefix(tree: Tree): {
  tree: Tree;
  elements: boolean;
} {
  return tree.name.startsWith(ELEMENTS_PREFIX)
    ? {
        tree: {
          name: tree.name.slice(ELEMENTS_PREFIX.length),
          args: tree.args
        },
        elements: true
      }
    : { tree, elements: false };
}

/** Appends the checksum to a descriptor body */
export function withChecksum(body: string, elements: boolean): string {
  const descriptor = (elements ? ELEMENTS_PREFIX : '') + body;
  return `${descriptor}#${DescriptorChecksum(descriptor)}`;
}

/** Checks the name and arity of a descriptor's top level node */
export function expectTopLevel(
  tree: Tree,
  name: string,
  argCount: number
): Tree[] {
  if (tree.name !== name || tree.args.length !== argCount)
    throw new MiniscriptError(
      'Unexpected',
      `${tree.name}(${tree.args.length} args) while parsing ${name} descriptor`
    );
  return tree.args;
}

export function defaultNetwork(elements: boolean): Network {
  return elements ? networks.liquid : networks.bitcoin;
}

export function encodeAddress(
  output: { type: 'pkh' | 'sh' | 'wpkh' | 'wsh'; hash: Uint8Array },
  network: Network
): string {
  const address = btc.Address(toBtcSignerNetwork(network));
  const { hash } = output;
  switch (output.type) {
    case 'pkh':
      return address.encode({ type: 'pkh', hash });
    case 'sh':
      return address.encode({ type: 'sh', hash });
    case 'wpkh':
      return address.encode({ type: 'wpkh', hash });
    case 'wsh':
      return address.encode({ type: 'wsh', hash });
  }
}

/** Signature and hash type byte, as pushed in a witness */
export function serializeSig({ signature, hashType }: EcdsaSig): Uint8Array {
  return concatBytes(signature, Uint8Array.of(hashType));
}

/** Signature for `key`, or a MissingSig error */
export function requireSig(
  satisfier: Satisfier,
  key: MiniscriptKey
): Uint8Array {
  const sig = satisfier.lookupEcdsaSig?.(key);
  if (sig === undefined)
    throw new MiniscriptError(
      'MissingSig',
      `Error: missing signature for key ${key.toString()}`
    );
  return serializeSig(sig);
}

/** Standard p2pkh script of a key */
export function p2pkhScript(key: MiniscriptKey): Uint8Array {
  return btc.OutScript.encode({ type: 'pkh', hash: pubkeyHash160(key) });
}
