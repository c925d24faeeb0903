// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { MiniscriptError } from '../errors.js';
import type { MiniscriptKey, Hash160Value } from '../keys.js';
import type { Fragment } from './ast.js';
import { directKeys, iterFragments } from './ast.js';

//See "Resource limitations" https://bitcoin.sipa.be/miniscript/
//and Bitcoin Core policy/consensus constants:
//https://github.com/bitcoin/bitcoin/blob/master/src/policy/policy.h
export const MAX_SCRIPT_ELEMENT_SIZE = 520;
export const MAX_SCRIPT_SIZE = 10000;
export const MAX_STANDARD_P2WSH_SCRIPT_SIZE = 3600;
export const MAX_STANDARD_P2WSH_STACK_ITEMS = 100;
export const MAX_OPS_PER_SCRIPT = 201;
export const MAX_SCRIPTSIG_SIZE = 1650;
export const MAX_STACK_SIZE = 1000;
export const MAX_BLOCK_WEIGHT = 4000000;

export type ContextName = 'Legacy' | 'Segwitv0' | 'Tap' | 'Bare' | 'NoChecks';

type AnyMiniscript = Fragment<MiniscriptKey, Hash160Value>;

/**
 * Consensus and standardness profile a miniscript is checked and encoded
 * under.
 */
export interface ScriptContext {
  readonly name: ContextName;
  /** Size of a signature witness element, length prefix included */
  readonly sigSize: number;
  /** Size of the push of `key` in a script */
  pkLen(key: MiniscriptKey): number;
  /** Key encoding and fragment admissibility, applied to every node */
  checkGlobalConsensusValidity(ms: AnyMiniscript): void;
  checkGlobalPolicyValidity(ms: AnyMiniscript): void;
  checkLocalConsensusValidity(ms: AnyMiniscript): void;
  checkLocalPolicyValidity(ms: AnyMiniscript): void;
  /** Extra restrictions on the fragment at the top of the script */
  otherTopLevelChecks(ms: AnyMiniscript): void;
  /** Bytes of witness (or scriptSig) needed by the largest satisfaction */
  maxSatisfactionSize(ms: AnyMiniscript): number | undefined;
  /** Witness elements of the largest satisfaction, script included */
  maxSatisfactionWitnessElements(ms: AnyMiniscript): number | undefined;
}

function ecdsaPkLen(key: MiniscriptKey): number {
  return key.isUncompressed() ? 66 : 34;
}

function forEachNode(ms: AnyMiniscript, fn: (ms: AnyMiniscript) => void) {
  for (const node of iterFragments(ms)) fn(node);
}

/** Keys must be full keys; multi_a is a tapscript fragment */
function checkEcdsaFragments(
  ms: AnyMiniscript,
  { compressedOnly }: { compressedOnly: boolean }
): void {
  forEachNode(ms, node => {
    const fragment = node.node;
    if (fragment.type === 'multi_a')
      throw new MiniscriptError(
        'MultiANotAllowed',
        `Error: multi_a is only allowed in tapscript: ${node.toString()}`
      );
    for (const key of directKeys(node.node)) {
      if (key.isXOnly())
        throw new MiniscriptError(
          'XOnlyKeysNotAllowed',
          `Error: x-only key ${key.toString()} not allowed in ${node.toString()}`
        );
      if (compressedOnly && key.isUncompressed())
        throw new MiniscriptError(
          'UncompressedPubkey',
          `Error: uncompressed key ${key.toString()} not allowed in segwit`
        );
    }
  });
}

function checkOpCount(ms: AnyMiniscript): void {
  const ops = ms.ext.ops.sat;
  if (ops !== undefined && ops > MAX_OPS_PER_SCRIPT)
    throw new MiniscriptError(
      'MaxOpCountExceeded',
      `Error: ${ops} ops in ${ms.toString()} exceed the limit of ${MAX_OPS_PER_SCRIPT}`
    );
}

export const Legacy: ScriptContext = {
  name: 'Legacy',
  sigSize: 73,
  pkLen: ecdsaPkLen,
  checkGlobalConsensusValidity(ms) {
    if (ms.ext.scriptSize > MAX_SCRIPT_ELEMENT_SIZE)
      throw new MiniscriptError(
        'MaxRedeemScriptSizeExceeded',
        `Error: redeem script of ${ms.ext.scriptSize} bytes exceeds ${MAX_SCRIPT_ELEMENT_SIZE} bytes`
      );
    checkEcdsaFragments(ms, { compressedOnly: false });
  },
  checkGlobalPolicyValidity() {
    //no extra standardness rules beyond consensus
  },
  checkLocalConsensusValidity: checkOpCount,
  checkLocalPolicyValidity(ms) {
    const size = ms.ext.satSize?.scriptSig;
    if (size !== undefined && size > MAX_SCRIPTSIG_SIZE)
      throw new MiniscriptError(
        'MaxScriptSigSizeExceeded',
        `Error: satisfaction of ${size} bytes exceeds the scriptSig limit of ${MAX_SCRIPTSIG_SIZE}`
      );
  },
  otherTopLevelChecks() {
    //any B fragment can be a redeem script
  },
  maxSatisfactionSize: ms => ms.ext.satSize?.scriptSig,
  //there is no witness: elements are pushed by the scriptSig
  maxSatisfactionWitnessElements: ms => ms.ext.satSize?.count
};

export const Segwitv0: ScriptContext = {
  name: 'Segwitv0',
  sigSize: 73,
  pkLen: ecdsaPkLen,
  checkGlobalConsensusValidity(ms) {
    if (ms.ext.scriptSize > MAX_SCRIPT_SIZE)
      throw new MiniscriptError(
        'MaxWitnessScriptSizeExceeded',
        `Error: witness script of ${ms.ext.scriptSize} bytes exceeds ${MAX_SCRIPT_SIZE} bytes`
      );
    checkEcdsaFragments(ms, { compressedOnly: true });
  },
  checkGlobalPolicyValidity(ms) {
    if (ms.ext.scriptSize > MAX_STANDARD_P2WSH_SCRIPT_SIZE)
      throw new MiniscriptError(
        'MaxWitnessScriptSizeExceeded',
        `Error: witness script of ${ms.ext.scriptSize} bytes exceeds the standard ${MAX_STANDARD_P2WSH_SCRIPT_SIZE} bytes`
      );
  },
  checkLocalConsensusValidity: checkOpCount,
  checkLocalPolicyValidity(ms) {
    const items = ms.ext.satSize?.count;
    if (items !== undefined && items > MAX_STANDARD_P2WSH_STACK_ITEMS)
      throw new MiniscriptError(
        'MaxWitnessItemsExceeded',
        `Error: satisfaction needs ${items} witness items, more than ${MAX_STANDARD_P2WSH_STACK_ITEMS}`
      );
  },
  otherTopLevelChecks() {
    //any B fragment can be a witness script
  },
  maxSatisfactionSize: ms => ms.ext.satSize?.witness,
  maxSatisfactionWitnessElements: ms => {
    const count = ms.ext.satSize?.count;
    return count === undefined ? undefined : count + 1;
  }
};

export const Tap: ScriptContext = {
  name: 'Tap',
  sigSize: 66,
  pkLen: () => 33,
  checkGlobalConsensusValidity(ms) {
    if (ms.ext.scriptSize > MAX_BLOCK_WEIGHT)
      throw new MiniscriptError(
        'MaxWitnessScriptSizeExceeded',
        `Error: tapscript of ${ms.ext.scriptSize} bytes exceeds ${MAX_BLOCK_WEIGHT} bytes`
      );
    forEachNode(ms, node => {
      if (node.node.type === 'multi')
        throw new MiniscriptError(
          'MultiNotAllowed',
          `Error: multi is disabled in tapscript, use multi_a: ${node.toString()}`
        );
      for (const key of directKeys(node.node)) {
        if (key.isUncompressed())
          throw new MiniscriptError(
            'UncompressedPubkey',
            `Error: uncompressed key ${key.toString()} not allowed in tapscript`
          );
      }
    });
  },
  checkGlobalPolicyValidity() {
    //tapscript has no script size standardness limit
  },
  checkLocalConsensusValidity(ms) {
    const items = ms.ext.satSize?.count;
    if (items !== undefined && items > MAX_STACK_SIZE)
      throw new MiniscriptError(
        'MaxWitnessItemsExceeded',
        `Error: satisfaction needs ${items} stack items, more than ${MAX_STACK_SIZE}`
      );
  },
  checkLocalPolicyValidity() {
    //covered by the consensus stack limit
  },
  otherTopLevelChecks() {
    //any B fragment can be a tapscript leaf
  },
  maxSatisfactionSize: ms => ms.ext.satSize?.witness,
  maxSatisfactionWitnessElements: ms => {
    const count = ms.ext.satSize?.count;
    return count === undefined ? undefined : count + 2;
  }
};

export const Bare: ScriptContext = {
  name: 'Bare',
  sigSize: 73,
  pkLen: ecdsaPkLen,
  checkGlobalConsensusValidity(ms) {
    if (ms.ext.scriptSize > MAX_SCRIPT_SIZE)
      throw new MiniscriptError(
        'MaxWitnessScriptSizeExceeded',
        `Error: bare script of ${ms.ext.scriptSize} bytes exceeds ${MAX_SCRIPT_SIZE} bytes`
      );
    checkEcdsaFragments(ms, { compressedOnly: false });
  },
  checkGlobalPolicyValidity() {
    //standardness of bare outputs is decided by otherTopLevelChecks
  },
  checkLocalConsensusValidity: checkOpCount,
  checkLocalPolicyValidity() {
    //bare outputs are only standard for the fragments listed below
  },
  otherTopLevelChecks(ms) {
    const fragment = ms.node;
    const sub = 'sub' in fragment ? fragment.sub.node.type : undefined;
    const standard =
      //relay policy takes bare multisig of up to 3 keys
      (fragment.type === 'multi' && fragment.keys.length <= 3) ||
      (fragment.type === 'check' &&
        (sub === 'pk_k' || sub === 'pk_h' || sub === 'raw_pkh'));
    if (!standard)
      throw new MiniscriptError(
        'NonStandardBareScript',
        `Error: ${ms.toString()} is not a standard bare script, use pk, pkh or multi of at most 3 keys`
      );
  },
  maxSatisfactionSize: ms => ms.ext.satSize?.scriptSig,
  maxSatisfactionWitnessElements: ms => ms.ext.satSize?.count
};

/**
 * Context used once a script has been lifted out of the transaction that
 * carried it. Nothing is checked.
 */
export const NoChecks: ScriptContext = {
  name: 'NoChecks',
  sigSize: 73,
  pkLen: key => (key.isXOnly() ? 33 : ecdsaPkLen(key)),
  checkGlobalConsensusValidity() {},
  checkGlobalPolicyValidity() {},
  checkLocalConsensusValidity() {},
  checkLocalPolicyValidity() {},
  otherTopLevelChecks() {},
  maxSatisfactionSize: ms => ms.ext.satSize?.witness,
  maxSatisfactionWitnessElements: ms => ms.ext.satSize?.count
};
