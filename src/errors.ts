// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

/**
 * Kinds of failures raised while parsing descriptors or miniscript, checking
 * them against a script context, encoding them or building witnesses.
 */
export type MiniscriptErrorKind =
  //syntax
  | 'BadDescriptor'
  | 'Unexpected'
  | 'Checksum'
  | 'UnknownFragment'
  | 'BadKey'
  | 'BadHash'
  | 'BadNumber'
  //typing and script shape
  | 'TypeCheck'
  | 'NonTopLevel'
  | 'Trailing'
  | 'UnexpectedToken'
  | 'NonMinimalVerify'
  | 'NonMinimalPush'
  //context limits and key encoding
  | 'UncompressedPubkey'
  | 'XOnlyKeysNotAllowed'
  | 'XOnlyKeysRequired'
  | 'MultiANotAllowed'
  | 'MultiNotAllowed'
  | 'MaxRedeemScriptSizeExceeded'
  | 'MaxWitnessScriptSizeExceeded'
  | 'MaxOpCountExceeded'
  | 'MaxScriptSigSizeExceeded'
  | 'MaxWitnessItemsExceeded'
  | 'NonStandardBareScript'
  | 'ScriptSizeTooLarge'
  | 'ImpossibleSatisfaction'
  //sanity
  | 'Malleable'
  | 'SigNotRequired'
  | 'MixedTimelocks'
  | 'RepeatedKeys'
  //satisfaction and output data
  | 'MissingSig'
  | 'CouldNotSatisfy'
  | 'BareDescriptorAddr'
  | 'KeyNotConvertible';

export class MiniscriptError extends Error {
  readonly kind: MiniscriptErrorKind;
  constructor(kind: MiniscriptErrorKind, message: string) {
    super(message);
    this.name = 'MiniscriptError';
    this.kind = kind;
  }
}

export type CovErrorKind =
  | 'BadCovDescriptor'
  | 'MissingSighashItem'
  | 'MissingCovSignature'
  | 'CovenantSighashTypeMismatch';

/**
 * Failures specific to covenant descriptors. `index` identifies the sighash
 * component that a satisfier could not provide (`MissingSighashItem`).
 */
export class CovError extends Error {
  readonly kind: CovErrorKind;
  readonly index: number | undefined;
  constructor(kind: CovErrorKind, message: string, index?: number) {
    super(message);
    this.name = 'CovError';
    this.kind = kind;
    this.index = index;
  }
}

export type InterpreterErrorKind =
  | 'NonEmptyWitness'
  | 'NonEmptyScriptSig'
  | 'UnexpectedStackEnd'
  | 'UnexpectedStackBoolean'
  | 'ExpectedPush'
  | 'PubkeyParseError'
  | 'XOnlyPublicKeyParseError'
  | 'UncompressedPubkey'
  | 'IncorrectPubkeyHash'
  | 'IncorrectWPubkeyHash'
  | 'IncorrectScriptHash'
  | 'IncorrectWScriptHash'
  | 'TapAnnexUnsupported'
  | 'ControlBlockParse'
  | 'ControlBlockVerificationError'
  | 'Miniscript';

const INTERPRETER_MESSAGES: Record<
  Exclude<InterpreterErrorKind, 'Miniscript'>,
  string
> = {
  NonEmptyWitness: 'legacy spend had nonempty witness',
  NonEmptyScriptSig: 'segwit spend had nonempty scriptsig',
  UnexpectedStackEnd: 'unexpected end of stack',
  UnexpectedStackBoolean: 'Expected Stack Push operation, found stack bool',
  ExpectedPush: 'expected push in script',
  PubkeyParseError: 'could not parse pubkey',
  XOnlyPublicKeyParseError: 'xonly pk parse error',
  UncompressedPubkey: 'uncompressed pubkey in non-legacy descriptor',
  IncorrectPubkeyHash: 'public key did not match scriptpubkey',
  IncorrectWPubkeyHash: 'public key did not match scriptpubkey (segwit v0)',
  IncorrectScriptHash: 'redeem script did not match scriptpubkey',
  IncorrectWScriptHash: 'witness script did not match scriptpubkey',
  TapAnnexUnsupported: 'Encountered annex element',
  ControlBlockParse: 'Control block parse error',
  ControlBlockVerificationError: 'Control block verification failed'
};

export class InterpreterError extends Error {
  readonly kind: InterpreterErrorKind;
  /** The miniscript error behind a `Miniscript` failure */
  readonly inner: MiniscriptError | undefined;
  constructor(
    kind: Exclude<InterpreterErrorKind, 'Miniscript'>,
    detail?: string
  );
  constructor(kind: 'Miniscript', inner: MiniscriptError);
  constructor(kind: InterpreterErrorKind, detail?: string | MiniscriptError) {
    const message =
      kind === 'Miniscript'
        ? `parse error: ${detail instanceof Error ? detail.message : detail}`
        : INTERPRETER_MESSAGES[kind] +
          (typeof detail === 'string' ? `: ${detail}` : '');
    super(message);
    this.name = 'InterpreterError';
    this.kind = kind;
    this.inner = detail instanceof MiniscriptError ? detail : undefined;
  }
}
