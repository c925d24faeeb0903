// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { verifyChecksum } from '../checksum.js';
import { parseTree } from '../expression.js';
import type { KeyParser, MiniscriptKey } from '../keys.js';
import { CovenantDescriptor } from './covenants/cov.js';
import type { PreTaprootDescriptor } from './pretaproot.js';
import { preTaprootFromTree } from './pretaproot.js';
import type { DescriptorOptions } from './traits.js';
import { ELEMENTS_PREFIX, splitElementsPrefix } from './traits.js';

export type AnyDescriptor<Pk extends MiniscriptKey> =
  | PreTaprootDescriptor<Pk>
  | CovenantDescriptor<Pk>;

/**
 * Parses any supported descriptor. `elcovwsh(...)` is a covenant; every
 * other name goes through {@link preTaprootFromTree}.
 */
export function descriptorFromString<Pk extends MiniscriptKey>(
  descriptor: string,
  parseKey: KeyParser<Pk>,
  { checksumRequired = false }: DescriptorOptions = {}
): AnyDescriptor<Pk> {
  const tree = parseTree(verifyChecksum(descriptor, { checksumRequired }));
  if (tree.name === `${ELEMENTS_PREFIX}covwsh`)
    return CovenantDescriptor.fromTree(tree, parseKey);
  const { tree: unprefixed, elements } = splitElementsPrefix(tree);
  return preTaprootFromTree(unprefixed, parseKey, { elements });
}
