// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
const { OP } = btc;
import { InterpreterError } from '../errors.js';
import type { Instruction } from '../scriptUtils.js';

/**
 * A stack item of a spend being interpreted. The empty push and the push
 * of `01` are kept as the booleans they stand for.
 */
export type Element =
  | { type: 'push'; data: Uint8Array }
  | { type: 'satisfied' }
  | { type: 'dissatisfied' };

export function elementFromBytes(data: Uint8Array): Element {
  if (data.length === 0) return { type: 'dissatisfied' };
  if (data.length === 1 && data[0] === 1) return { type: 'satisfied' };
  return { type: 'push', data };
}

/** scriptSig instructions must be pushes; OP_1 is a satisfied element */
export function elementFromInstruction(instruction: Instruction): Element {
  if (instruction.type === 'push') return elementFromBytes(instruction.data);
  if (instruction.op === OP.OP_1) return { type: 'satisfied' };
  throw new InterpreterError('ExpectedPush');
}

/** Bytes of a push, throwing for boolean elements */
export function asPush(element: Element): Uint8Array {
  if (element.type !== 'push') throw new InterpreterError('UnexpectedStackBoolean');
  return element.data;
}

/**
 * Data left on the stack of a spend. The top of the stack is the last
 * element.
 */
export class Stack {
  readonly #elements: Element[];

  constructor(elements: Element[] = []) {
    this.#elements = [...elements];
  }

  get length(): number {
    return this.#elements.length;
  }

  isEmpty(): boolean {
    return this.#elements.length === 0;
  }

  pop(): Element | undefined {
    return this.#elements.pop();
  }

  /** Pops the top element, throwing on an empty stack */
  popOrThrow(): Element {
    const element = this.#elements.pop();
    if (element === undefined) throw new InterpreterError('UnexpectedStackEnd');
    return element;
  }

  push(element: Element): void {
    this.#elements.push(element);
  }

  last(): Element | undefined {
    return this.#elements[this.#elements.length - 1];
  }

  /** Elements from the bottom of the stack to the top */
  toArray(): Element[] {
    return [...this.#elements];
  }
}
