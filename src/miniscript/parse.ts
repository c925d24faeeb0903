// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { hex } from '@scure/base';
import { MiniscriptError } from '../errors.js';
import type { Tree } from '../expression.js';
import { parseNum, parseTree, terminal, treeToString } from '../expression.js';
import type { KeyParser, MiniscriptKey } from '../keys.js';
import type { HashFragment, Node } from './ast.js';
import { HASH_FRAGMENTS, hashLength, wrapperFromChar } from './ast.js';
import type { ScriptContext } from './context.js';
import { Miniscript } from './miniscript.js';

const BINARY_FRAGMENTS = [
  'and_v',
  'and_b',
  'or_b',
  'or_d',
  'or_c',
  'or_i'
] as const;
type BinaryName = (typeof BINARY_FRAGMENTS)[number];

function isBinary(name: string): name is BinaryName {
  return BINARY_FRAGMENTS.some(binary => binary === name);
}

function isHashFragment(name: string): name is HashFragment {
  return HASH_FRAGMENTS.some(hash => hash === name);
}

function parseHash(value: string, length: number): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = hex.decode(value);
  } catch {
    throw new MiniscriptError('BadHash', `Error: invalid hash ${value}`);
  }
  if (bytes.length !== length)
    throw new MiniscriptError(
      'BadHash',
      `Error: hash ${value} must be ${length} bytes long`
    );
  return bytes;
}

/**
 * Builds the miniscript of an expression tree. Wrappers written as
 * `xyz:fragment` are applied right to left.
 */
export function miniscriptFromTree<Pk extends MiniscriptKey>(
  tree: Tree,
  ctx: ScriptContext,
  parseKey: KeyParser<Pk>
): Miniscript<Pk, Uint8Array> {
  const build = (node: Node<Pk, Uint8Array>) => Miniscript.fromAst(node, ctx);
  const sub = (child: Tree) => miniscriptFromTree(child, ctx, parseKey);
  const colon = tree.name.indexOf(':');
  const wrappers = colon === -1 ? '' : tree.name.slice(0, colon);
  const name = colon === -1 ? tree.name : tree.name.slice(colon + 1);
  if (colon !== -1 && wrappers === '')
    throw new MiniscriptError(
      'BadDescriptor',
      `Error: empty wrapper list in ${treeToString(tree)}`
    );
  const args = tree.args;
  const arity = (n: number) => {
    if (args.length !== n)
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: ${name} takes ${n} arguments, got ${args.length}`
      );
  };
  const keyArg = (i: number): Pk => {
    const arg = args[i];
    if (arg === undefined)
      throw new MiniscriptError('BadDescriptor', `Error: missing key in ${name}`);
    return terminal(arg, parseKey);
  };
  const arg = (i: number): Tree => {
    const child = args[i];
    if (child === undefined)
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: missing argument ${i} of ${name}`
      );
    return child;
  };

  let ms: Miniscript<Pk, Uint8Array>;
  if (name === '0' || name === '1') {
    arity(0);
    ms = build({ type: name === '0' ? 'false' : 'true' });
  } else if (name === 'pk_k' || name === 'pk_h') {
    arity(1);
    ms = build({ type: name, key: keyArg(0) });
  } else if (name === 'pk' || name === 'pkh') {
    arity(1);
    const inner = build({
      type: name === 'pk' ? 'pk_k' : 'pk_h',
      key: keyArg(0)
    });
    ms = build({ type: 'check', sub: inner });
  } else if (name === 'expr_raw_pkh') {
    arity(1);
    ms = build({
      type: 'raw_pkh',
      hash: terminal(arg(0), value => parseHash(value, 20))
    });
  } else if (name === 'after' || name === 'older') {
    arity(1);
    ms = build({ type: name, n: terminal(arg(0), parseNum) });
  } else if (isHashFragment(name)) {
    arity(1);
    ms = build({
      type: name,
      hash: terminal(arg(0), value => parseHash(value, hashLength(name)))
    });
  } else if (isBinary(name)) {
    arity(2);
    ms = build({ type: name, left: sub(arg(0)), right: sub(arg(1)) });
  } else if (name === 'and_n') {
    arity(2);
    ms = build({
      type: 'andor',
      a: sub(arg(0)),
      b: sub(arg(1)),
      c: build({ type: 'false' })
    });
  } else if (name === 'andor') {
    arity(3);
    ms = build({
      type: 'andor',
      a: sub(arg(0)),
      b: sub(arg(1)),
      c: sub(arg(2))
    });
  } else if (name === 'thresh') {
    if (args.length < 2)
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: thresh needs a threshold and at least one sub`
      );
    const k = terminal(arg(0), parseNum);
    ms = build({ type: 'thresh', k, subs: args.slice(1).map(sub) });
  } else if (name === 'multi' || name === 'multi_a') {
    if (args.length < 2)
      throw new MiniscriptError(
        'BadDescriptor',
        `Error: ${name} needs a threshold and at least one key`
      );
    const k = terminal(arg(0), parseNum);
    const keys = args.slice(1).map(key => terminal(key, parseKey));
    ms = build({ type: name, k, keys });
  } else
    throw new MiniscriptError(
      'UnknownFragment',
      `Error: unknown fragment ${name}`
    );

  for (const ch of [...wrappers].reverse()) {
    if (ch === 't')
      ms = build({ type: 'and_v', left: ms, right: build({ type: 'true' }) });
    else if (ch === 'l')
      ms = build({ type: 'or_i', left: build({ type: 'false' }), right: ms });
    else if (ch === 'u')
      ms = build({ type: 'or_i', left: ms, right: build({ type: 'false' }) });
    else {
      const wrapper = wrapperFromChar(ch);
      if (wrapper === undefined)
        throw new MiniscriptError(
          'UnknownFragment',
          `Error: unknown wrapper ${ch}: in ${tree.name}`
        );
      ms = build({ type: wrapper, sub: ms });
    }
  }
  return ms;
}

/**
 * Parses the textual form of a miniscript under `ctx`, checking that it can
 * be used as a whole script.
 *
 * Pass `{ sanityCheck: true }` to also reject scripts that are valid but
 * unsafe to use (see {@link Miniscript.sanityCheck}).
 */
export function parseMiniscript<Pk extends MiniscriptKey>(
  miniscript: string,
  ctx: ScriptContext,
  parseKey: KeyParser<Pk>,
  { sanityCheck = false }: { sanityCheck?: boolean } = {}
): Miniscript<Pk, Uint8Array> {
  const ms = topLevelFromTree(parseTree(miniscript), ctx, parseKey);
  if (sanityCheck) ms.sanityCheck();
  return ms;
}

/** {@link miniscriptFromTree} plus the top level and consensus checks */
export function topLevelFromTree<Pk extends MiniscriptKey>(
  tree: Tree,
  ctx: ScriptContext,
  parseKey: KeyParser<Pk>
): Miniscript<Pk, Uint8Array> {
  const ms = miniscriptFromTree(tree, ctx, parseKey);
  ms.checkTopLevel();
  ms.checkGlobalValidity();
  return ms;
}
