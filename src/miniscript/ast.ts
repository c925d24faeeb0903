// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { hex } from '@scure/base';
import type { MiniscriptKey, Hash160Value } from '../keys.js';
import { hash160Bytes } from '../keys.js';
import type { Type, ExtData } from './types.js';

/**
 * The part of a miniscript node that the type checker needs to see.
 * `Miniscript` implements it.
 */
export interface Fragment<Pk extends MiniscriptKey, H extends Hash160Value> {
  readonly node: Node<Pk, H>;
  readonly ty: Type;
  readonly ext: ExtData;
  toString(): string;
}

export type HashFragment = 'sha256' | 'hash256' | 'ripemd160' | 'hash160';
export type Wrapper =
  | 'alt'
  | 'swap'
  | 'check'
  | 'dupif'
  | 'verify'
  | 'nonzero'
  | 'zeronotequal';
export type Binary = 'and_v' | 'and_b' | 'or_b' | 'or_d' | 'or_c' | 'or_i';

/**
 * Miniscript fragments. Children are full miniscripts so that their type
 * information travels with them.
 */
export type Node<Pk extends MiniscriptKey, H extends Hash160Value> =
  | { type: 'true' }
  | { type: 'false' }
  | { type: 'pk_k'; key: Pk }
  | { type: 'pk_h'; key: Pk }
  | { type: 'raw_pkh'; hash: H }
  | { type: 'after'; n: number }
  | { type: 'older'; n: number }
  | { type: HashFragment; hash: Uint8Array }
  | { type: Wrapper; sub: Fragment<Pk, H> }
  | { type: Binary; left: Fragment<Pk, H>; right: Fragment<Pk, H> }
  | {
      type: 'andor';
      a: Fragment<Pk, H>;
      b: Fragment<Pk, H>;
      c: Fragment<Pk, H>;
    }
  | { type: 'thresh'; k: number; subs: Fragment<Pk, H>[] }
  | { type: 'multi' | 'multi_a'; k: number; keys: Pk[] };

export const HASH_FRAGMENTS: readonly HashFragment[] = [
  'sha256',
  'hash256',
  'ripemd160',
  'hash160'
];

export function hashLength(type: HashFragment): number {
  return type === 'sha256' || type === 'hash256' ? 32 : 20;
}

const WRAPPER_CHARS: Record<Wrapper, string> = {
  alt: 'a',
  swap: 's',
  check: 'c',
  dupif: 'd',
  verify: 'v',
  nonzero: 'j',
  zeronotequal: 'n'
};

const WRAPPERS: readonly Wrapper[] = [
  'alt',
  'swap',
  'check',
  'dupif',
  'verify',
  'nonzero',
  'zeronotequal'
];

export function wrapperFromChar(ch: string): Wrapper | undefined {
  return WRAPPERS.find(wrapper => WRAPPER_CHARS[wrapper] === ch);
}

/** Direct children, left to right */
export function children<Pk extends MiniscriptKey, H extends Hash160Value>(
  node: Node<Pk, H>
): Fragment<Pk, H>[] {
  switch (node.type) {
    case 'alt':
    case 'swap':
    case 'check':
    case 'dupif':
    case 'verify':
    case 'nonzero':
    case 'zeronotequal':
      return [node.sub];
    case 'and_v':
    case 'and_b':
    case 'or_b':
    case 'or_d':
    case 'or_c':
    case 'or_i':
      return [node.left, node.right];
    case 'andor':
      return [node.a, node.b, node.c];
    case 'thresh':
      return node.subs;
    default:
      return [];
  }
}

/**
 * Returns the wrapper letter a fragment is displayed with, together with the
 * wrapped fragment. `c:pk_k` and `c:pk_h` are not wrappers: they display as
 * `pk` and `pkh`.
 */
function wrapChar<Pk extends MiniscriptKey, H extends Hash160Value>(
  node: Node<Pk, H>
): [string, Fragment<Pk, H>] | undefined {
  switch (node.type) {
    case 'check':
      if (node.sub.node.type === 'pk_k' || node.sub.node.type === 'pk_h')
        return undefined;
      return ['c', node.sub];
    case 'alt':
    case 'swap':
    case 'dupif':
    case 'verify':
    case 'nonzero':
    case 'zeronotequal':
      return [WRAPPER_CHARS[node.type], node.sub];
    case 'and_v':
      return node.right.node.type === 'true' ? ['t', node.left] : undefined;
    case 'or_i':
      if (node.left.node.type === 'false') return ['l', node.right];
      if (node.right.node.type === 'false') return ['u', node.left];
      return undefined;
    default:
      return undefined;
  }
}

/** How keys and raw key hashes are written out */
export interface KeyPrinter<Pk extends MiniscriptKey, H extends Hash160Value> {
  key(key: Pk): string;
  rawPkh(hash: H): string;
}

const defaultPrinter: KeyPrinter<MiniscriptKey, Hash160Value> = {
  key: key => key.toString(),
  rawPkh: hash => `expr_raw_pkh(${hex.encode(hash160Bytes(hash))})`
};

function fragmentToString<Pk extends MiniscriptKey, H extends Hash160Value>(
  node: Node<Pk, H>,
  printer: KeyPrinter<Pk, H>
): string {
  const str = (child: Fragment<Pk, H>) => nodeToString(child.node, printer);
  switch (node.type) {
    case 'true':
      return '1';
    case 'false':
      return '0';
    case 'pk_k':
    case 'pk_h':
      return `${node.type}(${printer.key(node.key)})`;
    case 'raw_pkh':
      return printer.rawPkh(node.hash);
    case 'after':
    case 'older':
      return `${node.type}(${node.n})`;
    case 'sha256':
    case 'hash256':
    case 'ripemd160':
    case 'hash160':
      return `${node.type}(${hex.encode(node.hash)})`;
    case 'check': {
      const inner = node.sub.node;
      if (inner.type === 'pk_k') return `pk(${printer.key(inner.key)})`;
      if (inner.type === 'pk_h') return `pkh(${printer.key(inner.key)})`;
      return `c:${str(node.sub)}`;
    }
    case 'alt':
    case 'swap':
    case 'dupif':
    case 'verify':
    case 'nonzero':
    case 'zeronotequal':
      return `${WRAPPER_CHARS[node.type]}:${str(node.sub)}`;
    case 'and_v':
    case 'and_b':
    case 'or_b':
    case 'or_d':
    case 'or_c':
    case 'or_i':
      return `${node.type}(${str(node.left)},${str(node.right)})`;
    case 'andor':
      return node.c.node.type === 'false'
        ? `and_n(${str(node.a)},${str(node.b)})`
        : `andor(${str(node.a)},${str(node.b)},${str(node.c)})`;
    case 'thresh':
      return `thresh(${[node.k, ...node.subs.map(str)].join(',')})`;
    case 'multi':
    case 'multi_a':
      return `${node.type}(${[node.k, ...node.keys.map(key => printer.key(key))].join(',')})`;
  }
}

/**
 * Textual form of a fragment: wrappers are collected into a `xyz:` prefix
 * and the `pk`, `pkh`, `and_n`, `t:`, `l:` and `u:` shorthands are used.
 */
export function nodeToString<Pk extends MiniscriptKey, H extends Hash160Value>(
  node: Node<Pk, H>,
  printer: KeyPrinter<Pk, H> = defaultPrinter
): string {
  let wrappers = '';
  let current: Node<Pk, H> = node;
  for (let wrapped = wrapChar(current); wrapped; wrapped = wrapChar(current)) {
    wrappers += wrapped[0];
    current = wrapped[1].node;
  }
  const fragment = fragmentToString(current, printer);
  return wrappers === '' ? fragment : `${wrappers}:${fragment}`;
}

/** Keys written directly in a fragment (not in its children) */
export function directKeys<Pk extends MiniscriptKey, H extends Hash160Value>(
  node: Node<Pk, H>
): Pk[] {
  switch (node.type) {
    case 'pk_k':
    case 'pk_h':
      return [node.key];
    case 'multi':
    case 'multi_a':
      return node.keys;
    default:
      return [];
  }
}

/** Pre-order traversal of a fragment and all its descendants */
export function* iterFragments<
  Pk extends MiniscriptKey,
  H extends Hash160Value
>(fragment: Fragment<Pk, H>): Generator<Fragment<Pk, H>> {
  yield fragment;
  for (const child of children(fragment.node)) yield* iterFragments(child);
}
