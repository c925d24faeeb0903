// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { MiniscriptError } from './errors.js';

/**
 * A node of a descriptor expression such as `wsh(and_v(v:pk(A),older(10)))`.
 * Terminals (keys, hashes, numbers) are nodes without args.
 */
export interface Tree {
  name: string;
  args: Tree[];
}

const MAX_RECURSION_DEPTH = 402;

/**
 * Parses a descriptor (without checksum) into an expression tree.
 */
export function parseTree(expression: string): Tree {
  let pos = 0;

  const parseNode = (depth: number): Tree => {
    if (depth > MAX_RECURSION_DEPTH)
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: expression ${expression} exceeds the maximum nesting depth`
      );
    const start = pos;
    while (pos < expression.length && !'(),'.includes(expression.charAt(pos)))
      pos++;
    const name = expression.slice(start, pos);
    if (expression.charAt(pos) !== '(') return { name, args: [] };
    pos++; //(
    const args: Tree[] = [];
    for (;;) {
      args.push(parseNode(depth + 1));
      const ch = expression.charAt(pos);
      pos++;
      if (ch === ')') break;
      if (ch !== ',')
        throw new MiniscriptError(
          'BadDescriptor',
          `Error: expected ',' or ')' at position ${pos - 1} in ${expression}`
        );
    }
    return { name, args };
  };

  const tree = parseNode(0);
  if (pos !== expression.length)
    throw new MiniscriptError(
      'BadDescriptor',
      `Error: unexpected '${expression.charAt(pos)}' at position ${pos} in ${expression}`
    );
  return tree;
}

export function treeToString(tree: Tree): string {
  return tree.args.length === 0
    ? tree.name
    : `${tree.name}(${tree.args.map(treeToString).join(',')})`;
}

/**
 * Applies `convert` to a terminal node, rejecting nodes with arguments.
 */
export function terminal<T>(tree: Tree, convert: (name: string) => T): T {
  if (tree.args.length !== 0)
    throw new MiniscriptError(
      'Unexpected',
      `Error: ${treeToString(tree)} is not a terminal`
    );
  return convert(tree.name);
}

/**
 * Parses an unsigned 32 bit decimal without leading zeros.
 */
export function parseNum(s: string): number {
  if (!/^(0|[1-9][0-9]*)$/.test(s))
    throw new MiniscriptError('BadNumber', `Error: invalid number ${s}`);
  const n = Number(s);
  if (n > 0xffffffff)
    throw new MiniscriptError('BadNumber', `Error: number ${s} is too large`);
  return n;
}
