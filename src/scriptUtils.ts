// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
const { Script, OP, ScriptNum } = btc;
import { hex } from '@scure/base';
import { MiniscriptError } from './errors.js';

//Elements introspection opcode, missing from btc-signer's OP table
export const OP_CHECKSIGFROMSTACK = 0xc1;

// ---- Varint encoding ----

export function varintEncodingLength(n: number): number {
  if (n < 0xfd) return 1;
  if (n <= 0xffff) return 3;
  if (n <= 0xffffffff) return 5;
  return 9;
}

export function varintEncode(n: number): Uint8Array {
  const length = varintEncodingLength(n);
  const out = new Uint8Array(length);
  if (length === 1) {
    out[0] = n;
    return out;
  }
  out[0] = length === 3 ? 0xfd : length === 5 ? 0xfe : 0xff;
  let rest = BigInt(n);
  for (let i = 1; i < length; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

/** Size of the opcodes needed to push `length` bytes */
export function pushOpcodeSize(length: number): number {
  if (length < OP.PUSHDATA1) return 1;
  if (length <= 0xff) return 2;
  if (length <= 0xffff) return 3;
  return 5;
}

/** Size in bytes of the minimal push of integer `n` */
export function scriptNumSize(n: number): number {
  if (n <= 16) return 1;
  if (n < 0x80) return 2;
  if (n < 0x8000) return 3;
  if (n < 0x800000) return 4;
  if (n < 0x80000000) return 5;
  return 6;
}

export function u32LE(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n >>> 0, true);
  return out;
}

// ---- Script building ----

const VERIFY_FORMS: ReadonlyMap<number, number> = new Map([
  [OP.EQUAL, OP.EQUALVERIFY],
  [OP.NUMEQUAL, OP.NUMEQUALVERIFY],
  [OP.CHECKSIG, OP.CHECKSIGVERIFY],
  [OP.CHECKMULTISIG, OP.CHECKMULTISIGVERIFY]
]);

/**
 * Incremental script writer. Pushes are always minimal and `pushVerify`
 * folds a trailing EQUAL, NUMEQUAL, CHECKSIG or CHECKMULTISIG into its
 * VERIFY variant.
 */
export class ScriptBuilder {
  #bytes: number[] = [];
  //last opcode written, undefined after a data push
  #lastOp: number | undefined;

  pushOpcode(op: number): this {
    this.#bytes.push(op);
    this.#lastOp = op;
    return this;
  }

  pushVerify(): this {
    const verifyForm =
      this.#lastOp !== undefined ? VERIFY_FORMS.get(this.#lastOp) : undefined;
    if (verifyForm !== undefined) {
      this.#bytes[this.#bytes.length - 1] = verifyForm;
      this.#lastOp = verifyForm;
      return this;
    }
    return this.pushOpcode(OP.VERIFY);
  }

  pushInt(n: number): this {
    if (!Number.isSafeInteger(n))
      throw new MiniscriptError('BadNumber', `Error: invalid number ${n}`);
    if (n === -1) return this.pushOpcode(OP['1NEGATE']);
    if (n === 0) return this.pushOpcode(OP.OP_0);
    if (n >= 1 && n <= 16) return this.pushOpcode(OP.OP_1 - 1 + n);
    return this.#pushData(ScriptNum(6).encode(BigInt(n)));
  }

  /** Pushes arbitrary data using the smallest opcode that carries it */
  pushSlice(data: Uint8Array): this {
    if (data.length === 0) return this.pushOpcode(OP.OP_0);
    const first = data[0];
    if (data.length === 1 && first !== undefined) {
      if (first >= 1 && first <= 16) return this.pushOpcode(OP.OP_1 - 1 + first);
      if (first === 0x81) return this.pushOpcode(OP['1NEGATE']);
    }
    return this.#pushData(data);
  }

  #pushData(data: Uint8Array): this {
    const len = data.length;
    if (len < OP.PUSHDATA1) this.#bytes.push(len);
    else if (len <= 0xff) this.#bytes.push(OP.PUSHDATA1, len);
    else if (len <= 0xffff) this.#bytes.push(OP.PUSHDATA2, len & 0xff, len >> 8);
    else
      this.#bytes.push(
        OP.PUSHDATA4,
        len & 0xff,
        (len >> 8) & 0xff,
        (len >> 16) & 0xff,
        (len >>> 24) & 0xff
      );
    for (const byte of data) this.#bytes.push(byte);
    this.#lastOp = undefined;
    return this;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.#bytes);
  }
}

// ---- Instruction decoding ----

export type Instruction =
  | { type: 'op'; op: number }
  | { type: 'push'; data: Uint8Array };

function isMinimalPush(opcode: number, data: Uint8Array): boolean {
  const first = data[0];
  if (data.length === 0) return opcode === OP.OP_0;
  if (data.length === 1 && first !== undefined) {
    if (first >= 1 && first <= 16) return false;
    if (first === 0x81) return false;
  }
  if (data.length < OP.PUSHDATA1) return opcode === data.length;
  if (data.length <= 0xff) return opcode === OP.PUSHDATA1;
  if (data.length <= 0xffff) return opcode === OP.PUSHDATA2;
  return true;
}

/**
 * Splits a script into instructions. OP_0 is returned as an empty push;
 * OP_1NEGATE and OP_1 to OP_16 are returned as opcodes.
 * With `minimal` set, pushes that could have used a shorter opcode throw.
 */
export function decodeInstructions(
  script: Uint8Array,
  { minimal = false }: { minimal?: boolean } = {}
): Instruction[] {
  const instructions: Instruction[] = [];
  let pos = 0;
  const readLength = (bytes: number): number => {
    if (pos + bytes > script.length)
      throw new MiniscriptError(
        'UnexpectedToken',
        `Error: truncated push in script ${hex.encode(script)}`
      );
    let len = 0;
    for (let i = bytes - 1; i >= 0; i--) len = len * 256 + (script[pos + i] ?? 0);
    pos += bytes;
    return len;
  };
  while (pos < script.length) {
    const opcode = script[pos] ?? 0;
    pos++;
    if (opcode > OP.PUSHDATA4) {
      instructions.push({ type: 'op', op: opcode });
      continue;
    }
    let len: number;
    if (opcode < OP.PUSHDATA1) len = opcode;
    else if (opcode === OP.PUSHDATA1) len = readLength(1);
    else if (opcode === OP.PUSHDATA2) len = readLength(2);
    else len = readLength(4);
    if (pos + len > script.length)
      throw new MiniscriptError(
        'UnexpectedToken',
        `Error: truncated push in script ${hex.encode(script)}`
      );
    const data = script.slice(pos, pos + len);
    pos += len;
    if (minimal && !isMinimalPush(opcode, data))
      throw new MiniscriptError(
        'NonMinimalPush',
        `Error: non-minimal push of ${hex.encode(data)}`
      );
    instructions.push({ type: 'push', data });
  }
  return instructions;
}

/**
 * Decodes a minimally encoded script number of at most `maxBytes` bytes.
 * Returns undefined when `data` is not one.
 */
export function decodeScriptNum(
  data: Uint8Array,
  maxBytes = 5
): number | undefined {
  if (data.length > maxBytes) return undefined;
  try {
    const value = ScriptNum(maxBytes, true).decode(data);
    return Number(value);
  } catch {
    return undefined;
  }
}

// ---- ASM helpers ----

// Build set of valid btc-signer opcode names
const SIGNER_OP_NAMES = new Set<string>();
for (const key of Object.keys(OP)) {
  if (isNaN(Number(key))) {
    SIGNER_OP_NAMES.add(key);
  }
}

function isSignerOpName(token: string): token is keyof typeof OP {
  return SIGNER_OP_NAMES.has(token);
}

/**
 * Convert an ASM string to script bytes.
 * Empty data becomes OP_0 and single byte data 0x01-0x10 becomes OP_1-OP_16.
 */
export function fromASM(asm: string): Uint8Array {
  const scriptElements: (keyof typeof OP | Uint8Array)[] = [];
  for (const token of asm.trim().split(/\s+/)) {
    if (token === '') continue;
    const name =
      token.startsWith('OP_') && !/^OP_\d+$/.test(token)
        ? token.slice(3)
        : token;
    if (isSignerOpName(name)) {
      scriptElements.push(name);
      continue;
    }
    let data: Uint8Array;
    try {
      data = hex.decode(token);
    } catch {
      throw new Error(`Error: unknown ASM token: ${token}`);
    }
    const smallInt = data.length === 1 ? `OP_${data[0]}` : '';
    if (data.length === 0) scriptElements.push('OP_0');
    else if (smallInt !== 'OP_0' && isSignerOpName(smallInt))
      scriptElements.push(smallInt);
    else if (data.length === 1 && data[0] === 0x81)
      scriptElements.push('1NEGATE');
    else scriptElements.push(data);
  }
  return Script.encode(scriptElements);
}

/**
 * Encode a number for use in ASM.
 * Returns a hex string for non-zero numbers, "OP_0" for zero.
 */
export function numberEncodeAsm(number: number): string {
  if (Number.isSafeInteger(number) === false) {
    throw new Error(`Error: invalid number ${number}`);
  }
  if (number === 0) {
    return 'OP_0';
  }
  const encoded = ScriptNum(6).encode(BigInt(number));
  return hex.encode(encoded);
}

/**
 * Turns a push-only script into the stack items it leaves behind.
 * OP_1 to OP_16 become their single byte value.
 */
export function pushOnlyToStack(script: Uint8Array): Uint8Array[] {
  return decodeInstructions(script).map(instruction => {
    if (instruction.type === 'push') return instruction.data;
    const op = instruction.op;
    if (op >= OP.OP_1 && op <= OP.OP_16)
      return Uint8Array.of(op - OP.OP_1 + 1);
    if (op === OP['1NEGATE']) return Uint8Array.of(0x81);
    throw new Error(`Error: script ${hex.encode(script)} is not push only`);
  });
}

/** Serializes witness items as a minimal push-only scriptSig */
export function witnessToScriptSig(witness: Uint8Array[]): Uint8Array {
  const builder = new ScriptBuilder();
  for (const item of witness) builder.pushSlice(item);
  return builder.toBytes();
}
