// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { sha256 } from '@noble/hashes/sha2.js';
import {
  compareBytes,
  concatBytes,
  hash160
} from '@scure/btc-signer/utils.js';
import { CovenantDescriptor } from '../src/descriptor/covenants/cov.js';
import { covScriptCode } from '../src/descriptor/covenants/script.js';
import { InterpreterError, MiniscriptError } from '../src/errors.js';
import type { TxData } from '../src/interpreter/inner.js';
import { fromTxdata } from '../src/interpreter/inner.js';
import type { Element } from '../src/interpreter/stack.js';
import { parsePublicKey } from '../src/keys.js';
import type { MiniscriptKey } from '../src/keys.js';
import {
  A,
  A_UNCOMPRESSED,
  B,
  C,
  fakeSig,
  fromHex,
  push,
  toHex,
  xOnlyHex
} from './helpers/keys.js';

const EMPTY = new Uint8Array();
const sig = fakeSig(0x30, 72);
const schnorrSig = fakeSig(0x31, 64);

const p2pkh = (pubkey: string) =>
  btc.OutScript.encode({ type: 'pkh', hash: hash160(fromHex(pubkey)) });
const p2wpkh = (pubkey: string) =>
  btc.OutScript.encode({ type: 'wpkh', hash: hash160(fromHex(pubkey)) });
const p2wsh = (script: Uint8Array) =>
  btc.OutScript.encode({ type: 'wsh', hash: sha256(script) });
const p2sh = (script: Uint8Array) =>
  btc.OutScript.encode({ type: 'sh', hash: hash160(script) });

//<key> CHECKSIG
const pkScript = (pubkey: string) =>
  concatBytes(push(fromHex(pubkey)), Uint8Array.of(0xac));

function interpreterError(fn: () => unknown): InterpreterError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InterpreterError) return err;
    throw err;
  }
  throw new Error('expected an InterpreterError');
}

function stackHex(txData: TxData): string[] {
  return txData.stack
    .toArray()
    .map((element: Element) =>
      element.type === 'push' ? toHex(element.data) : element.type
    );
}

// ---- Taproot fixtures ----

const taggedHash = (tag: string, ...messages: Uint8Array[]) => {
  const tagHash = sha256(new TextEncoder().encode(tag));
  return sha256(concatBytes(tagHash, tagHash, ...messages));
};

/**
 * Output script and control block committing `leafScript` under the
 * internal key `internal`, next to the `siblings` leaf hashes.
 */
function taprootCommitment(
  internal: string,
  leafScript: Uint8Array,
  siblings: Uint8Array[],
  suffix = ''
): { spk: Uint8Array; controlBlock: Uint8Array } {
  let node = taggedHash(
    `TapLeaf${suffix}`,
    Uint8Array.of(0xc0, leafScript.length),
    leafScript
  );
  for (const sibling of siblings)
    node =
      compareBytes(node, sibling) < 0
        ? taggedHash(`TapBranch${suffix}`, node, sibling)
        : taggedHash(`TapBranch${suffix}`, sibling, node);
  const tweak = taggedHash(`TapTweak${suffix}`, fromHex(internal), node);
  const output = secp256k1.Point.fromHex(`02${internal}`).add(
    secp256k1.Point.BASE.multiply(BigInt(`0x${toHex(tweak)}`))
  );
  const compressed = fromHex(output.toHex(true));
  const parity = compressed[0] === 0x03 ? 1 : 0;
  return {
    spk: concatBytes(Uint8Array.of(0x51, 0x20), compressed.slice(1)),
    controlBlock: concatBytes(
      Uint8Array.of(0xc0 | parity),
      fromHex(internal),
      ...siblings
    )
  };
}

describe('p2pk', () => {
  test('classifies a compressed key', () => {
    const spk = pkScript(A);
    const txData = fromTxdata(spk, EMPTY, []);
    expect(txData.inner.type).toBe('publicKey');
    if (txData.inner.type !== 'publicKey') return;
    expect(txData.inner.pubkeyType).toBe('Pk');
    expect(txData.inner.key.toString()).toBe(A);
    expect(txData.stack.isEmpty()).toBe(true);
    expect(txData.scriptCode && toHex(txData.scriptCode)).toBe(toHex(spk));
  });

  test('accepts uncompressed keys', () => {
    const spk = concatBytes(
      Uint8Array.of(65),
      fromHex(A_UNCOMPRESSED),
      Uint8Array.of(0xac)
    );
    const txData = fromTxdata(spk, push(sig), []);
    expect(txData.inner.type === 'publicKey' && txData.inner.key.toString()).toBe(
      A_UNCOMPRESSED
    );
    expect(stackHex(txData)).toEqual([toHex(sig)]);
  });

  test('rejects a witness', () => {
    expect(
      interpreterError(() => fromTxdata(pkScript(A), push(sig), [sig])).kind
    ).toBe('NonEmptyWitness');
  });
});

describe('p2pkh', () => {
  test('pops the key from the scriptSig', () => {
    const scriptSig = concatBytes(push(sig), push(fromHex(A)));
    const txData = fromTxdata(p2pkh(A), scriptSig, []);
    expect(txData.inner).toMatchObject({ type: 'publicKey', pubkeyType: 'Pkh' });
    expect(stackHex(txData)).toEqual([toHex(sig)]);
  });

  test('checks the key hash', () => {
    const scriptSig = concatBytes(push(sig), push(fromHex(B)));
    const err = interpreterError(() => fromTxdata(p2pkh(A), scriptSig, []));
    expect(err.kind).toBe('IncorrectPubkeyHash');
    expect(err.message).toBe('public key did not match scriptpubkey');
  });

  test('needs a key', () => {
    expect(interpreterError(() => fromTxdata(p2pkh(A), EMPTY, [])).kind).toBe(
      'UnexpectedStackEnd'
    );
  });

  test('only takes pushes in the scriptSig', () => {
    expect(
      interpreterError(() => fromTxdata(p2pkh(A), Uint8Array.of(0x76), []))
        .kind
    ).toBe('ExpectedPush');
  });

  test('only takes minimal pushes in the scriptSig', () => {
    //PUSHDATA1 of a single byte
    const err = interpreterError(() =>
      fromTxdata(p2pkh(A), Uint8Array.of(0x4c, 0x01, 0x05), [])
    );
    expect(err.kind).toBe('Miniscript');
    expect(err.inner?.kind).toBe('NonMinimalPush');
  });
});

describe('p2wpkh', () => {
  test('signs the equivalent p2pkh script', () => {
    const txData = fromTxdata(p2wpkh(A), EMPTY, [sig, fromHex(A)]);
    expect(txData.inner).toMatchObject({ type: 'publicKey', pubkeyType: 'Wpkh' });
    expect(txData.scriptCode && toHex(txData.scriptCode)).toBe(
      toHex(p2pkh(A))
    );
    expect(stackHex(txData)).toEqual([toHex(sig)]);
  });

  test('rejects uncompressed keys', () => {
    const err = interpreterError(() =>
      fromTxdata(p2wpkh(A_UNCOMPRESSED), EMPTY, [sig, fromHex(A_UNCOMPRESSED)])
    );
    expect(err.kind).toBe('UncompressedPubkey');
    expect(err.message).toBe('uncompressed pubkey in non-legacy descriptor');
  });

  test('rejects uncompressed keys before checking their hash', () => {
    expect(
      interpreterError(() =>
        fromTxdata(p2wpkh(A), EMPTY, [sig, fromHex(A_UNCOMPRESSED)])
      ).kind
    ).toBe('UncompressedPubkey');
  });

  test('rejects a scriptSig', () => {
    expect(
      interpreterError(() =>
        fromTxdata(p2wpkh(A), push(fakeSig(0x01, 10)), [sig, fromHex(A)])
      ).kind
    ).toBe('NonEmptyScriptSig');
  });
});

describe('p2wsh', () => {
  const script = pkScript(A);

  test('parses the witness script as segwit v0 miniscript', () => {
    const txData = fromTxdata(p2wsh(script), EMPTY, [sig, script]);
    expect(txData.inner.type).toBe('script');
    if (txData.inner.type !== 'script') return;
    expect(txData.inner.scriptType).toBe('Wsh');
    expect(txData.inner.ms.toString()).toBe(`pk(${A})`);
    expect(txData.inner.ms.ctx.name).toBe('NoChecks');
    expect(txData.scriptCode && toHex(txData.scriptCode)).toBe(toHex(script));
    expect(stackHex(txData)).toEqual([toHex(sig)]);
  });

  test('checks the script hash', () => {
    expect(
      interpreterError(() =>
        fromTxdata(p2wsh(pkScript(B)), EMPTY, [sig, script])
      ).kind
    ).toBe('IncorrectWScriptHash');
  });

  test('reports scripts that are not miniscript', () => {
    const nop = Uint8Array.of(0x61);
    const err = interpreterError(() => fromTxdata(p2wsh(nop), EMPTY, [nop]));
    expect(err.kind).toBe('Miniscript');
    expect(err.inner).toBeInstanceOf(MiniscriptError);
  });

  test('recognizes covenants before plain miniscript', () => {
    const cov = CovenantDescriptor.fromString(
      `elcovwsh(${A},pk(${B}))`,
      parsePublicKey
    );
    const items = Array.from({ length: 11 }, (_, i) => fakeSig(i + 2, 4));
    const witness = [sig, ...items, sig, cov.encode()];
    const txData = fromTxdata(cov.getScriptPubKey(), EMPTY, witness);
    expect(txData.inner.type).toBe('covScript');
    if (txData.inner.type !== 'covScript') return;
    expect(txData.inner.key.toString()).toBe(A);
    expect(txData.inner.ms.toString()).toBe(`pk(${B})`);
    expect(txData.scriptCode && toHex(txData.scriptCode)).toBe(
      toHex(covScriptCode())
    );
    expect(txData.stack.length).toBe(13);
  });

  test('needs the witness script', () => {
    expect(
      interpreterError(() => fromTxdata(p2wsh(script), EMPTY, [])).kind
    ).toBe('UnexpectedStackEnd');
  });

  test('checks the script hash of covenants', () => {
    const cov = CovenantDescriptor.fromString(
      `elcovwsh(${A},pk(${B}))`,
      parsePublicKey
    );
    expect(
      interpreterError(() =>
        fromTxdata(p2wsh(script), EMPTY, [sig, cov.encode()])
      ).kind
    ).toBe('IncorrectWScriptHash');
  });
});

describe('p2sh', () => {
  test('routes 22 byte v0 programs to nested wpkh', () => {
    const redeemScript = p2wpkh(A);
    const txData = fromTxdata(p2sh(redeemScript), push(redeemScript), [
      sig,
      fromHex(A)
    ]);
    expect(txData.inner).toMatchObject({
      type: 'publicKey',
      pubkeyType: 'ShWpkh'
    });
    expect(txData.scriptCode && toHex(txData.scriptCode)).toBe(
      toHex(p2pkh(A))
    );
  });

  test('routes 34 byte v0 programs to nested wsh', () => {
    const script = pkScript(A);
    const redeemScript = p2wsh(script);
    const txData = fromTxdata(p2sh(redeemScript), push(redeemScript), [
      sig,
      script
    ]);
    expect(txData.inner.type === 'script' && txData.inner.scriptType).toBe(
      'ShWsh'
    );
    expect(stackHex(txData)).toEqual([toHex(sig)]);
  });

  test('a nested wsh program is never parsed as a legacy script', () => {
    const redeemScript = p2wsh(pkScript(A));
    //without a witness the nested path runs out of stack
    expect(
      interpreterError(() =>
        fromTxdata(p2sh(redeemScript), push(redeemScript), [])
      ).kind
    ).toBe('UnexpectedStackEnd');
  });

  test('parses other redeem scripts as legacy miniscript', () => {
    const redeemScript = pkScript(A_UNCOMPRESSED);
    const scriptSig = concatBytes(push(sig), push(redeemScript));
    const txData = fromTxdata(p2sh(redeemScript), scriptSig, []);
    expect(txData.inner.type).toBe('script');
    if (txData.inner.type !== 'script') return;
    expect(txData.inner.scriptType).toBe('Sh');
    expect(txData.inner.ms.toString()).toBe(`pk(${A_UNCOMPRESSED})`);
    expect(stackHex(txData)).toEqual([toHex(sig)]);
  });

  test('rejects a witness on legacy redeem scripts', () => {
    const redeemScript = pkScript(A);
    const scriptSig = concatBytes(push(sig), push(redeemScript));
    expect(
      interpreterError(() => fromTxdata(p2sh(redeemScript), scriptSig, [sig]))
        .kind
    ).toBe('NonEmptyWitness');
  });

  test('checks the script hash', () => {
    const redeemScript = pkScript(A);
    const err = interpreterError(() =>
      fromTxdata(p2sh(pkScript(B)), push(redeemScript), [])
    );
    expect(err.kind).toBe('IncorrectScriptHash');
    expect(err.message).toBe('redeem script did not match scriptpubkey');
  });
});

describe('Bare scripts', () => {
  test('are parsed from the script pubkey', () => {
    const spk = concatBytes(
      Uint8Array.of(0x51),
      push(fromHex(A)),
      push(fromHex(B)),
      Uint8Array.of(0x52, 0xae)
    );
    const txData = fromTxdata(spk, concatBytes(Uint8Array.of(0), push(sig)), []);
    expect(txData.inner.type).toBe('script');
    if (txData.inner.type !== 'script') return;
    expect(txData.inner.scriptType).toBe('Bare');
    expect(txData.inner.ms.toString()).toBe(`multi(1,${A},${B})`);
    expect(stackHex(txData)).toEqual(['dissatisfied', toHex(sig)]);
  });

  test('are classified even when they are not standard', () => {
    //and_v(v:pk(A),pk(B))
    const spk = concatBytes(
      push(fromHex(A)),
      Uint8Array.of(0xad),
      push(fromHex(B)),
      Uint8Array.of(0xac)
    );
    const sigA = fakeSig(0x32, 72);
    const sigB = fakeSig(0x33, 72);
    const txData = fromTxdata(spk, concatBytes(push(sigB), push(sigA)), []);
    expect(txData.inner.type).toBe('script');
    if (txData.inner.type !== 'script') return;
    expect(txData.inner.scriptType).toBe('Bare');
    expect(txData.inner.ms.toString()).toBe(`and_v(v:pk(${A}),pk(${B}))`);
    expect(stackHex(txData)).toEqual([toHex(sigB), toHex(sigA)]);
  });
});

describe('Taproot', () => {
  const leafScript = pkScript(xOnlyHex(2n));
  const sibling = new Uint8Array(32).fill(0x07);
  const { spk, controlBlock } = taprootCommitment(
    xOnlyHex(1n),
    leafScript,
    [sibling]
  );

  test('a single witness element is a key spend', () => {
    const txData = fromTxdata(spk, EMPTY, [schnorrSig]);
    expect(txData.inner).toMatchObject({ type: 'publicKey', pubkeyType: 'Tr' });
    expect(txData.inner.type === 'publicKey' && txData.inner.key.toString()).toBe(
      toHex(spk.slice(2))
    );
    expect(txData.scriptCode).toBeUndefined();
  });

  test('a key spend may start with the annex byte', () => {
    const keySig = Uint8Array.of(0x50, ...fakeSig(0x01, 63));
    expect(fromTxdata(spk, EMPTY, [keySig]).inner.type).toBe('publicKey');
  });

  test('verifies script spends against the output key', () => {
    const txData = fromTxdata(spk, EMPTY, [
      schnorrSig,
      leafScript,
      controlBlock
    ]);
    expect(txData.inner.type).toBe('script');
    if (txData.inner.type !== 'script') return;
    expect(txData.inner.scriptType).toBe('Tr');
    expect(txData.inner.ms.toString()).toBe(`pk(${xOnlyHex(2n)})`);
    expect(txData.scriptCode && toHex(txData.scriptCode)).toBe(
      toHex(leafScript)
    );
    expect(stackHex(txData)).toEqual([toHex(schnorrSig)]);
  });

  test('rejects a control block for another internal key', () => {
    const other = taprootCommitment(xOnlyHex(3n), leafScript, [sibling]);
    const err = interpreterError(() =>
      fromTxdata(spk, EMPTY, [schnorrSig, leafScript, other.controlBlock])
    );
    expect(err.kind).toBe('ControlBlockVerificationError');
    expect(err.message).toBe('Control block verification failed');
  });

  test('rejects malformed control blocks', () => {
    const err = interpreterError(() =>
      fromTxdata(spk, EMPTY, [schnorrSig, leafScript, new Uint8Array(34)])
    );
    expect(err.kind).toBe('ControlBlockParse');
    expect(err.message).toBe('Control block parse error: invalid size 34');
  });

  test('rejects the annex even when the spend verifies', () => {
    const err = interpreterError(() =>
      fromTxdata(spk, EMPTY, [
        schnorrSig,
        leafScript,
        controlBlock,
        Uint8Array.of(0x50, 0x01)
      ])
    );
    expect(err.kind).toBe('TapAnnexUnsupported');
    expect(err.message).toBe('Encountered annex element');
  });

  test('needs a witness', () => {
    expect(interpreterError(() => fromTxdata(spk, EMPTY, [])).kind).toBe(
      'UnexpectedStackEnd'
    );
  });

  test('elements chains use their own hash tags', () => {
    const elements = taprootCommitment(
      xOnlyHex(1n),
      leafScript,
      [sibling],
      '/elements'
    );
    const witness = [schnorrSig, leafScript, elements.controlBlock];
    expect(
      fromTxdata(elements.spk, EMPTY, witness, { elements: true }).inner.type
    ).toBe('script');
    expect(
      interpreterError(() => fromTxdata(elements.spk, EMPTY, witness)).kind
    ).toBe('ControlBlockVerificationError');
  });

  test('keys in tapscripts must be x-only', () => {
    const fullKeyScript = pkScript(C);
    const full = taprootCommitment(xOnlyHex(1n), fullKeyScript, []);
    const err = interpreterError(() =>
      fromTxdata(full.spk, EMPTY, [schnorrSig, fullKeyScript, full.controlBlock])
    );
    expect(err.kind).toBe('Miniscript');
    expect(err.inner?.kind).toBe('BadKey');
  });
});

describe('Keys of lifted scripts', () => {
  test('keep the form of their context', () => {
    const keys: MiniscriptKey[] = [];
    const script = pkScript(A);
    const txData = fromTxdata(p2wsh(script), EMPTY, [sig, script]);
    if (txData.inner.type !== 'script') throw new Error('expected a script');
    txData.inner.ms.forEachKey(key => {
      keys.push(key);
      return true;
    });
    expect(keys.map(key => key.isXOnly())).toEqual([false]);
  });
});
