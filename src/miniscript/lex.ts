// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
const { OP } = btc;
import { MiniscriptError } from '../errors.js';
import { decodeInstructions, decodeScriptNum } from '../scriptUtils.js';

/**
 * A lexed script element. Small pushes and OP_1..OP_16 are numbers, other
 * pushes keep their bytes and `*VERIFY` opcodes are split in two.
 */
export type Token =
  | { type: 'op'; op: number }
  | { type: 'num'; n: number }
  | { type: 'push'; data: Uint8Array };

const SPLIT_VERIFY: ReadonlyMap<number, number> = new Map([
  [OP.EQUALVERIFY, OP.EQUAL],
  [OP.NUMEQUALVERIFY, OP.NUMEQUAL],
  [OP.CHECKSIGVERIFY, OP.CHECKSIG],
  [OP.CHECKMULTISIGVERIFY, OP.CHECKMULTISIG]
]);

//Pushes of these sizes are keys or hashes, never numbers
const MAX_NUM_PUSH = 5;

export function lex(script: Uint8Array): Token[] {
  const tokens: Token[] = [];
  for (const instruction of decodeInstructions(script, { minimal: true })) {
    if (instruction.type === 'push') {
      const { data } = instruction;
      if (data.length > MAX_NUM_PUSH) {
        tokens.push({ type: 'push', data });
        continue;
      }
      const n = decodeScriptNum(data);
      if (n === undefined || n < 0)
        throw new MiniscriptError(
          'UnexpectedToken',
          `Error: invalid number push in script`
        );
      tokens.push({ type: 'num', n });
      continue;
    }
    const { op } = instruction;
    if (op >= OP.OP_1 && op <= OP.OP_16) {
      tokens.push({ type: 'num', n: op - OP.OP_1 + 1 });
      continue;
    }
    const unverified = SPLIT_VERIFY.get(op);
    if (unverified !== undefined) {
      tokens.push({ type: 'op', op: unverified }, { type: 'op', op: OP.VERIFY });
      continue;
    }
    if (op === OP.VERIFY) {
      const last = tokens[tokens.length - 1];
      if (
        last?.type === 'op' &&
        [...SPLIT_VERIFY.values()].includes(last.op)
      )
        throw new MiniscriptError(
          'NonMinimalVerify',
          `Error: VERIFY after an opcode with a VERIFY form`
        );
    }
    tokens.push({ type: 'op', op });
  }
  return tokens;
}
