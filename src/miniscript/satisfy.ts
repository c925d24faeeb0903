// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { satisfier as miniscriptSatisfier } from '@bitcoinerlab/miniscript';
import { hex } from '@scure/base';
import { concatBytes, hash160 } from '@scure/btc-signer/utils.js';
import { MiniscriptError } from '../errors.js';
import type { MiniscriptKey, Hash160Value } from '../keys.js';
import { hash160Bytes } from '../keys.js';
import type { Satisfier } from '../satisfier.js';
import { fromASM, numberEncodeAsm, pushOnlyToStack } from '../scriptUtils.js';
import type { Fragment } from './ast.js';
import { directKeys, iterFragments, nodeToString } from './ast.js';
import type { ScriptContext } from './context.js';
import { keyBytes } from './encode.js';
import { solveFragment } from './satisfaction.js';

/**
 * Variables (@0, @1, ...) standing for the keys of a miniscript, so that it
 * can be handed to the satisfier of @bitcoinerlab/miniscript.
 */
class Expansion {
  readonly #ctx: ScriptContext;
  readonly #variables = new Map<
    string,
    { key: MiniscriptKey; pubkey: Uint8Array }
  >();

  constructor(ctx: ScriptContext) {
    this.#ctx = ctx;
  }

  variable(key: MiniscriptKey): string {
    for (const [variable, entry] of this.#variables)
      if (entry.key.toString() === key.toString()) return variable;
    const variable = `@${this.#variables.size}`;
    this.#variables.set(variable, { key, pubkey: keyBytes(key, this.#ctx) });
    return variable;
  }

  entries() {
    return this.#variables.entries();
  }
}

/**
 * Particularize an expanded ASM expression: variables become pubkeys and
 * numbers become their minimal push.
 */
function substituteAsm(expandedAsm: string, expansion: Expansion): string {
  let asm = expandedAsm;
  for (const [variable, { pubkey }] of expansion.entries())
    asm = asm
      .replaceAll(`<${variable}>`, `<${hex.encode(pubkey)}>`)
      .replaceAll(
        `<HASH160(${variable})>`,
        `<${hex.encode(hash160(pubkey))}>`
      );
  return (
    asm
      .trim()
      .replace(/\s+/g, ' ')
      //numbers are not enclosed in <>, since <> is already encoded hex
      .replace(/(<\d+>)|\b\d+\b/g, match =>
        match.startsWith('<') ? match : numberEncodeAsm(Number(match))
      )
      .replace(/[<>]/g, '')
  );
}

//satisfier verifies internally whether the miniscript is sane
function solve(expandedMiniscript: string, knowns: string[]) {
  try {
    return miniscriptSatisfier(expandedMiniscript, { knowns });
  } catch (err) {
    throw new MiniscriptError(
      'CouldNotSatisfy',
      `Error: cannot satisfy ${expandedMiniscript}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Builds the witness of a miniscript with the signatures and preimages the
 * satisfier knows about.
 *
 * Assumptions: the attacker does not have access to any of the private keys
 * of the script, and only has access to hash preimages that honest users
 * have access to as well.
 */
export function satisfyFragment(
  ms: Fragment<MiniscriptKey, Hash160Value>,
  ctx: ScriptContext,
  satisfier: Satisfier,
  { malleable }: { malleable: boolean }
): Uint8Array[] {
  if (malleable)
    console.warn(`Warning: using malleable satisfactions for ${ms.toString()}`);
  if (malleable || !isSane(ms)) {
    const stack = solveFragment(ms, ctx, satisfier, { malleable });
    if (typeof stack === 'string')
      throw new MiniscriptError(
        'CouldNotSatisfy',
        `Error: unresolvable miniscript ${ms.toString()} (satisfaction ${stack}). Did you provide all the signatures and preimages, and are its timelocks satisfied?`
      );
    return stack;
  }
  return satisfyExpanded(ms, ctx, satisfier);
}

/**
 * Whether the satisfier of @bitcoinerlab/miniscript accepts the fragment:
 * non-malleable, requiring a signature, without repeated keys, mixed
 * timelocks or multi_a.
 */
function isSane(ms: Fragment<MiniscriptKey, Hash160Value>): boolean {
  if (!ms.ty.mall.s || !ms.ty.mall.m) return false;
  if (ms.ext.timelocks.containsCombination) return false;
  const seen = new Set<string>();
  for (const { node } of iterFragments(ms)) {
    if (node.type === 'multi_a') return false;
    for (const key of directKeys(node)) {
      if (seen.has(key.toString())) return false;
      seen.add(key.toString());
    }
  }
  return true;
}

function satisfyExpanded(
  ms: Fragment<MiniscriptKey, Hash160Value>,
  ctx: ScriptContext,
  satisfier: Satisfier
): Uint8Array[] {
  const fragments = [...iterFragments(ms)];
  const expansion = new Expansion(ctx);
  const expandedMiniscript = nodeToString(ms.node, {
    key: key => expansion.variable(key),
    rawPkh: hash => {
      const key = satisfier.lookupPkhPk?.(hash160Bytes(hash));
      if (key === undefined)
        throw new MiniscriptError(
          'CouldNotSatisfy',
          `Error: unknown key for hash ${hex.encode(hash160Bytes(hash))}`
        );
      return `pk_h(${expansion.variable(key)})`;
    }
  });

  //convert the known signatures into { '<sig(@0)>': '<3045...01>', ... } and
  //preimages into { '<sha256_preimage(6c...33)>': '<10...5f>', ... }
  const knownsMap = new Map<string, string>();
  for (const [variable, { key }] of expansion.entries()) {
    const sig = satisfier.lookupEcdsaSig?.(key);
    if (sig)
      knownsMap.set(
        `<sig(${variable})>`,
        `<${hex.encode(concatBytes(sig.signature, Uint8Array.of(sig.hashType)))}>`
      );
  }
  for (const { node } of fragments) {
    if (
      node.type === 'sha256' ||
      node.type === 'hash256' ||
      node.type === 'ripemd160' ||
      node.type === 'hash160'
    ) {
      const preimage = satisfier.lookupPreimage?.(node.type, node.hash);
      if (preimage)
        knownsMap.set(
          `<${node.type}_preimage(${hex.encode(node.hash)})>`,
          `<${hex.encode(preimage)}>`
        );
    }
  }

  const solutions = solve(expandedMiniscript, [...knownsMap.keys()]);
  const sats = solutions.nonMalleableSats ?? [];

  const sat = sats.find(
    sat =>
      (sat.nLockTime === undefined ||
        (satisfier.checkAfter?.(sat.nLockTime) ?? false)) &&
      (sat.nSequence === undefined ||
        (satisfier.checkOlder?.(sat.nSequence) ?? false))
  );
  if (sat === undefined)
    throw new MiniscriptError(
      'CouldNotSatisfy',
      `Error: unresolvable miniscript ${ms.toString()}. Did you provide all the signatures and preimages, and are its timelocks satisfied?`
    );

  let expandedAsm = sat.asm;
  for (const [search, replace] of knownsMap)
    expandedAsm = expandedAsm.replaceAll(search, replace);
  return pushOnlyToStack(fromASM(substituteAsm(expandedAsm, expansion)));
}
