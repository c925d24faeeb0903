// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
const { OP } = btc;
import { CovError, MiniscriptError } from '../../errors.js';
import { PublicKey } from '../../keys.js';
import { decodeTokens } from '../../miniscript/decode.js';
import type { ScriptContext } from '../../miniscript/context.js';
import { Segwitv0 } from '../../miniscript/context.js';
import type { Token } from '../../miniscript/lex.js';
import { lex } from '../../miniscript/lex.js';
import type { Miniscript } from '../../miniscript/miniscript.js';
import { OP_CHECKSIGFROMSTACK, ScriptBuilder } from '../../scriptUtils.js';

/** Sighash items the covenant concatenates, signature excluded */
export const COV_SIGHASH_ITEMS = 11;

/**
 * Opcodes counted against the 201 ops limit by the covenant tail. One less
 * when the miniscript ends in an opcode with a VERIFY form.
 */
export const COV_SCRIPT_OPS = 24;

/** Size of the covenant tail. One less with a free VERIFY. */
export const COV_SCRIPT_SIZE = 58;

/**
 * Appends the part of the covenant evaluated after OP_CODESEPARATOR: checks
 * the transaction signature, concatenates the sighash items and checks the
 * same signature over their hash with CHECKSIGFROMSTACK.
 */
export function pushPostCodesepScript(builder: ScriptBuilder): ScriptBuilder {
  builder.pushOpcode(OP.CHECKSIGVERIFY);
  for (let i = 0; i < COV_SIGHASH_ITEMS - 1; i++) builder.pushOpcode(OP.CAT);
  return builder
    .pushOpcode(OP.SHA256)
    .pushOpcode(OP.FROMALTSTACK)
    .pushOpcode(OP_CHECKSIGFROMSTACK);
}

/**
 * Script code to use when the covenant key signs: only the script after
 * OP_CODESEPARATOR is committed to.
 */
export function covScriptCode(): Uint8Array {
  return pushPostCodesepScript(new ScriptBuilder()).toBytes();
}

/**
 * Appends the covenant check for `pubkey` to an encoded miniscript.
 *
 * The witness below the miniscript satisfaction holds the signature and
 * the sighash items. The signature plus the first byte of the sighash type
 * is checked against the transaction, then checked again over the hash of
 * the concatenated items.
 */
export function pushCovVerify(
  builder: ScriptBuilder,
  pubkey: Uint8Array
): ScriptBuilder {
  builder
    .pushVerify()
    .pushInt(COV_SIGHASH_ITEMS)
    .pushOpcode(OP.PICK)
    .pushOpcode(OP.OVER)
    .pushInt(1)
    .pushOpcode(OP.LEFT)
    .pushOpcode(OP.CAT)
    .pushSlice(pubkey)
    .pushOpcode(OP.DUP)
    .pushOpcode(OP.TOALTSTACK)
    .pushOpcode(OP.CODESEPARATOR);
  return pushPostCodesepScript(builder);
}

type Expected =
  | { type: 'op'; op: number }
  | { type: 'num'; n: number }
  | { type: 'pubkey' };

const op = (code: number): Expected => ({ type: 'op', op: code });

//Covenant tail read backwards, from the last token of the script
const COV_TAIL: readonly Expected[] = [
  op(OP_CHECKSIGFROMSTACK),
  op(OP.FROMALTSTACK),
  op(OP.SHA256),
  ...Array.from({ length: COV_SIGHASH_ITEMS - 1 }, () => op(OP.CAT)),
  op(OP.VERIFY),
  op(OP.CHECKSIG),
  op(OP.CODESEPARATOR),
  op(OP.TOALTSTACK),
  op(OP.DUP),
  { type: 'pubkey' },
  op(OP.CAT),
  op(OP.LEFT),
  { type: 'num', n: 1 },
  op(OP.OVER),
  op(OP.PICK),
  { type: 'num', n: COV_SIGHASH_ITEMS },
  op(OP.VERIFY)
];

/**
 * Matches the covenant tail at the end of a lexed script, one state per
 * expected token. Returns the covenant key and the tokens left for the
 * miniscript, or undefined at the first mismatch.
 */
export function matchCovTail(
  tokens: Token[]
): { pubkey: Uint8Array; rest: Token[] } | undefined {
  let pubkey: Uint8Array | undefined;
  let pos = tokens.length;
  for (const expected of COV_TAIL) {
    pos--;
    const token = tokens[pos];
    if (token === undefined) return undefined;
    if (expected.type === 'pubkey') {
      if (token.type !== 'push') return undefined;
      pubkey = token.data;
    } else if (expected.type === 'op') {
      if (token.type !== 'op' || token.op !== expected.op) return undefined;
    } else if (token.type !== 'num' || token.n !== expected.n) return undefined;
  }
  if (pubkey === undefined) return undefined;
  return { pubkey, rest: tokens.slice(0, pos) };
}

/**
 * Splits a covenant script into its key and miniscript. The miniscript is
 * decoded under `ctx` and checked against the segwit v0 consensus rules.
 */
export function parseCovComponents(
  script: Uint8Array,
  ctx: ScriptContext
): { pk: PublicKey; ms: Miniscript<PublicKey> } {
  const match = matchCovTail(lex(script));
  if (match === undefined)
    throw new CovError(
      'BadCovDescriptor',
      'Error: script does not end in a covenant check'
    );
  let pk: PublicKey;
  try {
    pk = PublicKey.fromBytes(match.pubkey);
  } catch (err) {
    throw new CovError(
      'BadCovDescriptor',
      `Error: invalid covenant key: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const ms = decodeTokens(match.rest, ctx, bytes => PublicKey.fromBytes(bytes));
  Segwitv0.checkGlobalConsensusValidity(ms);
  Segwitv0.checkLocalConsensusValidity(ms);
  if (ms.ty.corr.base !== 'B')
    throw new MiniscriptError(
      'NonTopLevel',
      `Error: ${ms.toString()} is ${ms.ty.corr.base}, a covenant miniscript must be B`
    );
  return { pk, ms };
}
