// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
const { OP } = btc;
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { hex } from '@scure/base';
import {
  compareBytes,
  concatBytes,
  equalBytes,
  hash160
} from '@scure/btc-signer/utils.js';
import {
  covScriptCode,
  parseCovComponents
} from '../descriptor/covenants/script.js';
import { CovError, InterpreterError, MiniscriptError } from '../errors.js';
import type { BitcoinKey, TypedHash160 } from '../keys.js';
import { PublicKey, XOnlyPublicKey, pubkeyHash160 } from '../keys.js';
import type { ScriptContext } from '../miniscript/context.js';
import {
  Bare,
  Legacy,
  NoChecks,
  Segwitv0,
  Tap
} from '../miniscript/context.js';
import type { KeyDecoder } from '../miniscript/decode.js';
import {
  decodeMiniscript,
  decodeMiniscriptInsane
} from '../miniscript/decode.js';
import { Miniscript } from '../miniscript/miniscript.js';
import { decodeInstructions, varintEncode } from '../scriptUtils.js';
import type { Element } from './stack.js';
import {
  Stack,
  asPush,
  elementFromBytes,
  elementFromInstruction
} from './stack.js';

/** Spends that reveal a single key */
export type PubkeyType = 'Pk' | 'Pkh' | 'Wpkh' | 'ShWpkh' | 'Tr';
/** Spends that reveal a script */
export type ScriptType = 'Bare' | 'Sh' | 'Wsh' | 'ShWsh' | 'Tr';

/**
 * A miniscript lifted out of its context. Keys keep the form they had in
 * the script and raw key hashes record which form they must be matched
 * against.
 */
export type NoChecksMiniscript = Miniscript<BitcoinKey, TypedHash160>;

/** What a spend is checked against */
export type Inner =
  | { type: 'publicKey'; key: BitcoinKey; pubkeyType: PubkeyType }
  | { type: 'script'; ms: NoChecksMiniscript; scriptType: ScriptType }
  | { type: 'covScript'; key: BitcoinKey; ms: NoChecksMiniscript };

export interface TxData {
  inner: Inner;
  /** Data left after the keys and scripts of the spend are taken out */
  stack: Stack;
  /**
   * Script code for signature hashes. The p2pkh script for wpkh spends,
   * the post OP_CODESEPARATOR script for covenants, the tapscript for
   * taproot script spends and undefined for taproot key spends.
   */
  scriptCode: Uint8Array | undefined;
}

const TAPROOT_ANNEX_PREFIX = 0x50;
const CONTROL_BLOCK_BASE_SIZE = 33;
const CONTROL_BLOCK_NODE_SIZE = 32;
const TAPROOT_CONTROL_MAX_NODE_COUNT = 128;
const CURVE_ORDER =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

// ---- Output script shapes ----

function isP2pk(spk: Uint8Array): boolean {
  return (
    (spk.length === 35 && spk[0] === 33 && spk[34] === OP.CHECKSIG) ||
    (spk.length === 67 && spk[0] === 65 && spk[66] === OP.CHECKSIG)
  );
}

function isP2pkh(spk: Uint8Array): boolean {
  return (
    spk.length === 25 &&
    spk[0] === OP.DUP &&
    spk[1] === OP.HASH160 &&
    spk[2] === 20 &&
    spk[23] === OP.EQUALVERIFY &&
    spk[24] === OP.CHECKSIG
  );
}

function isP2wpkh(spk: Uint8Array): boolean {
  return spk.length === 22 && spk[0] === OP.OP_0 && spk[1] === 20;
}

function isP2wsh(spk: Uint8Array): boolean {
  return spk.length === 34 && spk[0] === OP.OP_0 && spk[1] === 32;
}

function isP2tr(spk: Uint8Array): boolean {
  return spk.length === 34 && spk[0] === OP.OP_1 && spk[1] === 32;
}

function isP2sh(spk: Uint8Array): boolean {
  return (
    spk.length === 23 &&
    spk[0] === OP.HASH160 &&
    spk[1] === 20 &&
    spk[22] === OP.EQUAL
  );
}

const p2pkhScript = (pk: PublicKey) =>
  btc.OutScript.encode({ type: 'pkh', hash: pubkeyHash160(pk) });
const p2wpkhScript = (pk: PublicKey) =>
  btc.OutScript.encode({ type: 'wpkh', hash: pubkeyHash160(pk) });
const p2wshScript = (script: Uint8Array) =>
  btc.OutScript.encode({ type: 'wsh', hash: sha256(script) });
const p2shScript = (script: Uint8Array) =>
  btc.OutScript.encode({ type: 'sh', hash: hash160(script) });

// ---- Keys and scripts popped from the stacks ----

function pkFromSlice(bytes: Uint8Array, requireCompressed: boolean): PublicKey {
  let pk: PublicKey;
  try {
    pk = PublicKey.fromBytes(bytes);
  } catch {
    throw new InterpreterError('PubkeyParseError');
  }
  if (requireCompressed && !pk.compressed)
    throw new InterpreterError('UncompressedPubkey');
  return pk;
}

function pkFromElement(
  element: Element,
  requireCompressed: boolean
): PublicKey {
  if (element.type !== 'push') throw new InterpreterError('PubkeyParseError');
  return pkFromSlice(element.data, requireCompressed);
}

/** Runs a parse step, reporting miniscript failures as interpreter errors */
function parsing<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof MiniscriptError)
      throw new InterpreterError('Miniscript', err);
    throw err;
  }
}

/**
 * Parses the script of a stack element under `ctx`. Boolean elements are
 * the scripts `1` and `0`.
 */
function scriptFromElement<Pk extends BitcoinKey>(
  element: Element,
  ctx: ScriptContext,
  decodeKey: KeyDecoder<Pk>
): Miniscript<Pk> {
  return parsing(() => {
    if (element.type === 'push')
      return decodeMiniscript(element.data, ctx, decodeKey);
    return Miniscript.fromAst<Pk, Uint8Array>(
      { type: element.type === 'satisfied' ? 'true' : 'false' },
      ctx
    );
  });
}

const decodeFullKey: KeyDecoder<PublicKey> = bytes =>
  PublicKey.fromBytes(bytes);
const decodeXOnlyKey: KeyDecoder<XOnlyPublicKey> = bytes =>
  XOnlyPublicKey.fromBytes(bytes);

/**
 * Re-expresses a miniscript under the NoChecks context. Raw key hashes are
 * tagged with the key form of the context they were parsed in.
 */
function toNoChecks<Pk extends BitcoinKey>(
  ms: Miniscript<Pk>
): NoChecksMiniscript {
  const kind = ms.ctx.name === 'Tap' ? 'xonly' : 'full';
  return ms.translatePk<BitcoinKey, TypedHash160>(
    { pk: key => key, pkh: hash => ({ kind, hash }) },
    NoChecks
  );
}

/** Covenant key and miniscript of a witness script, if it is a covenant */
function covComponentsFromElement(
  element: Element
): { key: PublicKey; ms: NoChecksMiniscript } | undefined {
  if (element.type !== 'push') return undefined;
  try {
    const { pk, ms } = parseCovComponents(element.data, Segwitv0);
    return { key: pk, ms: toNoChecks(ms) };
  } catch (err) {
    //not a covenant: the script is parsed as a plain miniscript
    if (err instanceof CovError || err instanceof MiniscriptError)
      return undefined;
    throw err;
  }
}

// ---- Taproot ----

interface ControlBlock {
  leafVersion: number;
  outputKeyParity: number;
  internalKey: XOnlyPublicKey;
  merklePath: Uint8Array[];
}

function parseControlBlock(bytes: Uint8Array): ControlBlock {
  const nodes =
    (bytes.length - CONTROL_BLOCK_BASE_SIZE) / CONTROL_BLOCK_NODE_SIZE;
  if (
    !Number.isInteger(nodes) ||
    nodes < 0 ||
    nodes > TAPROOT_CONTROL_MAX_NODE_COUNT
  )
    throw new InterpreterError(
      'ControlBlockParse',
      `invalid size ${bytes.length}`
    );
  let internalKey: XOnlyPublicKey;
  try {
    internalKey = XOnlyPublicKey.fromBytes(
      bytes.slice(1, CONTROL_BLOCK_BASE_SIZE)
    );
  } catch {
    throw new InterpreterError('ControlBlockParse', 'invalid internal key');
  }
  const first = bytes[0] ?? 0;
  const merklePath: Uint8Array[] = [];
  for (let i = 0; i < nodes; i++) {
    const start = CONTROL_BLOCK_BASE_SIZE + i * CONTROL_BLOCK_NODE_SIZE;
    merklePath.push(bytes.slice(start, start + CONTROL_BLOCK_NODE_SIZE));
  }
  return {
    leafVersion: first & 0xfe,
    outputKeyParity: first & 1,
    internalKey,
    merklePath
  };
}

function taggedHash(tag: string, ...messages: Uint8Array[]): Uint8Array {
  const tagHash = sha256(new TextEncoder().encode(tag));
  return sha256(concatBytes(tagHash, tagHash, ...messages));
}

/**
 * Whether the control block commits `script` to `outputKey`. Elements
 * chains use their own hash tags.
 */
function verifyTaprootCommitment(
  controlBlock: ControlBlock,
  outputKey: XOnlyPublicKey,
  script: Uint8Array,
  { elements }: { elements: boolean }
): boolean {
  const suffix = elements ? '/elements' : '';
  let node = taggedHash(
    `TapLeaf${suffix}`,
    Uint8Array.of(controlBlock.leafVersion),
    varintEncode(script.length),
    script
  );
  for (const sibling of controlBlock.merklePath)
    node =
      compareBytes(node, sibling) < 0
        ? taggedHash(`TapBranch${suffix}`, node, sibling)
        : taggedHash(`TapBranch${suffix}`, sibling, node);
  const internalKey = controlBlock.internalKey.toBytes();
  const tweak = BigInt(
    '0x' + hex.encode(taggedHash(`TapTweak${suffix}`, internalKey, node))
  );
  if (tweak >= CURVE_ORDER) return false;
  const internalPoint = secp256k1.Point.fromHex('02' + hex.encode(internalKey));
  const tweaked =
    tweak === 0n
      ? internalPoint
      : internalPoint.add(secp256k1.Point.BASE.multiply(tweak));
  const compressed = hex.decode(tweaked.toHex(true));
  const parity = compressed[0] === 0x03 ? 1 : 0;
  return (
    parity === controlBlock.outputKeyParity &&
    equalBytes(compressed.slice(1), outputKey.toBytes())
  );
}

// ---- Classification ----

function requireEmpty(
  stack: Stack,
  kind: 'NonEmptyWitness' | 'NonEmptyScriptSig'
): void {
  if (!stack.isEmpty()) throw new InterpreterError(kind);
}

/**
 * Classifies a spend from its previous output script, scriptSig and
 * witness. Returns what the spend is checked against, the stack left for
 * the checks and the script code of its signatures.
 *
 * Every script found is parsed under the context of its output type and
 * then converted to NoChecks.
 */
export function fromTxdata(
  spk: Uint8Array,
  scriptSig: Uint8Array,
  witness: Uint8Array[],
  { elements = false }: { elements?: boolean } = {}
): TxData {
  const ssigStack = new Stack(
    parsing(() => decodeInstructions(scriptSig, { minimal: true })).map(
      elementFromInstruction
    )
  );
  const witStack = new Stack(witness.map(elementFromBytes));

  if (isP2pk(spk)) {
    requireEmpty(witStack, 'NonEmptyWitness');
    return {
      inner: {
        type: 'publicKey',
        key: pkFromSlice(spk.slice(1, spk.length - 1), false),
        pubkeyType: 'Pk'
      },
      stack: ssigStack,
      scriptCode: spk
    };
  }

  if (isP2pkh(spk)) {
    requireEmpty(witStack, 'NonEmptyWitness');
    const pk = pkFromElement(ssigStack.popOrThrow(), false);
    if (!equalBytes(spk, p2pkhScript(pk)))
      throw new InterpreterError('IncorrectPubkeyHash');
    return {
      inner: { type: 'publicKey', key: pk, pubkeyType: 'Pkh' },
      stack: ssigStack,
      scriptCode: spk
    };
  }

  if (isP2wpkh(spk)) {
    requireEmpty(ssigStack, 'NonEmptyScriptSig');
    const pk = pkFromElement(witStack.popOrThrow(), true);
    if (!equalBytes(spk, p2wpkhScript(pk)))
      throw new InterpreterError('IncorrectWPubkeyHash');
    return {
      inner: { type: 'publicKey', key: pk, pubkeyType: 'Wpkh' },
      stack: witStack,
      scriptCode: p2pkhScript(pk)
    };
  }

  if (isP2wsh(spk)) {
    requireEmpty(ssigStack, 'NonEmptyScriptSig');
    const element = witStack.popOrThrow();
    //covenants are recognized before plain miniscripts
    const cov = covComponentsFromElement(element);
    if (cov !== undefined) {
      if (!equalBytes(spk, p2wshScript(asPush(element))))
        throw new InterpreterError('IncorrectWScriptHash');
      return {
        inner: { type: 'covScript', key: cov.key, ms: cov.ms },
        stack: witStack,
        scriptCode: covScriptCode()
      };
    }
    const ms = scriptFromElement(element, Segwitv0, decodeFullKey);
    const script = ms.encode();
    if (!equalBytes(spk, p2wshScript(script)))
      throw new InterpreterError('IncorrectWScriptHash');
    return {
      inner: { type: 'script', ms: toNoChecks(ms), scriptType: 'Wsh' },
      stack: witStack,
      scriptCode: script
    };
  }

  if (isP2tr(spk)) {
    requireEmpty(ssigStack, 'NonEmptyScriptSig');
    let outputKey: XOnlyPublicKey;
    try {
      outputKey = XOnlyPublicKey.fromBytes(spk.slice(2));
    } catch {
      throw new InterpreterError('XOnlyPublicKeyParseError');
    }
    const top = witStack.last();
    if (
      witStack.length >= 2 &&
      top?.type === 'push' &&
      top.data[0] === TAPROOT_ANNEX_PREFIX
    )
      throw new InterpreterError('TapAnnexUnsupported');
    if (witStack.isEmpty()) throw new InterpreterError('UnexpectedStackEnd');
    if (witStack.length === 1)
      return {
        inner: { type: 'publicKey', key: outputKey, pubkeyType: 'Tr' },
        stack: witStack,
        scriptCode: undefined
      };
    const controlBlockBytes = asPush(witStack.popOrThrow());
    const tapScriptElement = witStack.popOrThrow();
    const controlBlock = parseControlBlock(controlBlockBytes);
    const ms = scriptFromElement(tapScriptElement, Tap, decodeXOnlyKey);
    const tapScript = ms.encode();
    if (
      !verifyTaprootCommitment(controlBlock, outputKey, tapScript, { elements })
    )
      throw new InterpreterError('ControlBlockVerificationError');
    return {
      inner: { type: 'script', ms: toNoChecks(ms), scriptType: 'Tr' },
      stack: witStack,
      scriptCode: tapScript
    };
  }

  if (isP2sh(spk)) {
    const element = ssigStack.popOrThrow();
    if (element.type === 'push') {
      const redeemScript = element.data;
      if (!equalBytes(spk, p2shScript(redeemScript)))
        throw new InterpreterError('IncorrectScriptHash');
      if (isP2wpkh(redeemScript)) {
        const keyElement = witStack.popOrThrow();
        requireEmpty(ssigStack, 'NonEmptyScriptSig');
        const pk = pkFromElement(keyElement, true);
        if (!equalBytes(redeemScript, p2wpkhScript(pk)))
          throw new InterpreterError('IncorrectWScriptHash');
        return {
          inner: { type: 'publicKey', key: pk, pubkeyType: 'ShWpkh' },
          stack: witStack,
          scriptCode: p2pkhScript(pk)
        };
      }
      if (isP2wsh(redeemScript)) {
        const scriptElement = witStack.popOrThrow();
        requireEmpty(ssigStack, 'NonEmptyScriptSig');
        const ms = scriptFromElement(scriptElement, Segwitv0, decodeFullKey);
        const script = ms.encode();
        if (!equalBytes(redeemScript, p2wshScript(script)))
          throw new InterpreterError('IncorrectWScriptHash');
        return {
          inner: { type: 'script', ms: toNoChecks(ms), scriptType: 'ShWsh' },
          stack: witStack,
          scriptCode: script
        };
      }
    }
    const ms = scriptFromElement(element, Legacy, decodeFullKey);
    const script = ms.encode();
    requireEmpty(witStack, 'NonEmptyWitness');
    if (!equalBytes(spk, p2shScript(script)))
      throw new InterpreterError('IncorrectScriptHash');
    return {
      inner: { type: 'script', ms: toNoChecks(ms), scriptType: 'Sh' },
      stack: ssigStack,
      scriptCode: script
    };
  }

  requireEmpty(witStack, 'NonEmptyWitness');
  const ms = parsing(() => decodeMiniscriptInsane(spk, Bare, decodeFullKey));
  return {
    inner: { type: 'script', ms: toNoChecks(ms), scriptType: 'Bare' },
    stack: ssigStack,
    scriptCode: spk
  };
}
