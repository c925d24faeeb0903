// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

export { DescriptorChecksum as checksum, verifyChecksum } from './checksum.js';
export type { Tree } from './expression.js';
export { parseTree, treeToString } from './expression.js';
export type {
  CovErrorKind,
  InterpreterErrorKind,
  MiniscriptErrorKind
} from './errors.js';
export { CovError, InterpreterError, MiniscriptError } from './errors.js';
export type {
  BitcoinKey,
  Hash160Value,
  KeyParser,
  MiniscriptKey,
  ToPublicKey,
  Translator,
  TypedHash160
} from './keys.js';
export {
  KeyName,
  PublicKey,
  XOnlyPublicKey,
  parseKeyName,
  parsePublicKey,
  parseXOnlyPublicKey
} from './keys.js';
export type { Network } from './networks.js';
export { networks } from './networks.js';
export type { EcdsaSig, Outpoint, Satisfier } from './satisfier.js';

export type { ContextName, ScriptContext } from './miniscript/context.js';
export {
  Bare as BareCtx,
  Legacy,
  NoChecks,
  Segwitv0,
  Tap
} from './miniscript/context.js';
export { Miniscript } from './miniscript/miniscript.js';
export { parseMiniscript } from './miniscript/parse.js';
export {
  decodeMiniscript,
  decodeMiniscriptInsane
} from './miniscript/decode.js';

export type {
  Descriptor,
  DescriptorOptions,
  Satisfaction
} from './descriptor/traits.js';
export { Bare, Pkh } from './descriptor/bare.js';
export type { ScriptInner } from './descriptor/segwitv0.js';
export { Wpkh, Wsh } from './descriptor/segwitv0.js';
export { Sh } from './descriptor/sh.js';
export { SortedMultiVec } from './descriptor/sortedmulti.js';
export type { PreTaprootDescriptor } from './descriptor/pretaproot.js';
export {
  preTaprootFromString,
  preTaprootFromTree
} from './descriptor/pretaproot.js';
export { CovenantDescriptor } from './descriptor/covenants/cov.js';
export {
  COV_SCRIPT_OPS,
  COV_SCRIPT_SIZE,
  covScriptCode
} from './descriptor/covenants/script.js';
export type { AnyDescriptor } from './descriptor/descriptor.js';
export { descriptorFromString } from './descriptor/descriptor.js';

export type {
  Inner,
  NoChecksMiniscript,
  PubkeyType,
  ScriptType,
  TxData
} from './interpreter/inner.js';
export { fromTxdata } from './interpreter/inner.js';
export type { Element } from './interpreter/stack.js';
export { Stack } from './interpreter/stack.js';
