// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import type { Tree } from '../expression.js';
import type { KeyParser, MiniscriptKey } from '../keys.js';
import { Bare, Pkh } from './bare.js';
import { Wpkh, Wsh } from './segwitv0.js';
import { Sh } from './sh.js';
import type { DescriptorOptions } from './traits.js';
import { parseDescriptorTree } from './traits.js';

/** Every descriptor that can be spent without taproot */
export type PreTaprootDescriptor<Pk extends MiniscriptKey> =
  | Bare<Pk>
  | Pkh<Pk>
  | Wpkh<Pk>
  | Sh<Pk>
  | Wsh<Pk>;

/**
 * Builds the descriptor of an expression tree whose `el` prefix, if any,
 * has already been removed. The wrappers are matched by name and arity in
 * the order pkh, wpkh, sh, wsh; anything else is a bare script.
 */
export function preTaprootFromTree<Pk extends MiniscriptKey>(
  tree: Tree,
  parseKey: KeyParser<Pk>,
  { elements = false } = {}
): PreTaprootDescriptor<Pk> {
  const options = { elements };
  if (tree.args.length === 1) {
    switch (tree.name) {
      case 'pkh':
        return Pkh.fromTree(tree, parseKey, options);
      case 'wpkh':
        return Wpkh.fromTree(tree, parseKey, options);
      case 'sh':
        return Sh.fromTree(tree, parseKey, options);
      case 'wsh':
        return Wsh.fromTree(tree, parseKey, options);
    }
  }
  return Bare.fromTree(tree, parseKey, options);
}

/**
 * Parses any pre-taproot descriptor:
 *
 * ```
 * preTaprootFromString('wsh(and_v(v:pk(K),older(144)))', parsePublicKey)
 * ```
 */
export function preTaprootFromString<Pk extends MiniscriptKey>(
  descriptor: string,
  parseKey: KeyParser<Pk>,
  options: DescriptorOptions = {}
): PreTaprootDescriptor<Pk> {
  const { tree, elements } = parseDescriptorTree(descriptor, options);
  return preTaprootFromTree(tree, parseKey, { elements });
}
