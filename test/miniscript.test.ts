// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { sha256 } from '@noble/hashes/sha2.js';
import { hash160 } from '@scure/btc-signer/utils.js';
import { MiniscriptError } from '../src/errors.js';
import { PublicKey, parsePublicKey } from '../src/keys.js';
import { Legacy, Segwitv0 } from '../src/miniscript/context.js';
import { decodeMiniscript } from '../src/miniscript/decode.js';
import { parseMiniscript } from '../src/miniscript/parse.js';
import {
  A,
  A_UNCOMPRESSED,
  B,
  C,
  fakeSig,
  fromHex,
  sigSatisfier,
  toHex
} from './helpers/keys.js';

const decodeKey = (bytes: Uint8Array) => PublicKey.fromBytes(bytes);

function miniscriptError(fn: () => unknown): MiniscriptError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MiniscriptError) return err;
    throw err;
  }
  throw new Error('expected a MiniscriptError');
}

describe('Miniscript encoding', () => {
  test('pk compiles to a CHECKSIG', () => {
    const ms = parseMiniscript(`pk(${A})`, Segwitv0, parsePublicKey);
    expect(toHex(ms.encode())).toBe(`21${A}ac`);
    expect(ms.toString()).toBe(`pk(${A})`);
  });

  test('returns a fresh script on every call', () => {
    const ms = parseMiniscript(`pk(${A})`, Segwitv0, parsePublicKey);
    const script = ms.encode();
    script.fill(0);
    expect(toHex(ms.encode())).toBe(`21${A}ac`);
  });

  test('verify wrappers merge into the opcode before them', () => {
    const ms = parseMiniscript(
      `and_v(v:pk(${A}),older(10))`,
      Segwitv0,
      parsePublicKey
    );
    //<A> CHECKSIGVERIFY 10 CHECKSEQUENCEVERIFY
    expect(toHex(ms.encode())).toBe(`21${A}ad5ab2`);
  });

  test('decodes back to the same miniscript', () => {
    const text = `or_d(pk(${A}),and_v(v:pk(${B}),older(144)))`;
    const ms = parseMiniscript(text, Segwitv0, parsePublicKey);
    const decoded = decodeMiniscript(ms.encode(), Segwitv0, decodeKey);
    expect(decoded.toString()).toBe(text);
    expect(toHex(decoded.encode())).toBe(toHex(ms.encode()));
  });

  test('key hash patterns decode to raw key hashes', () => {
    const hash = toHex(hash160(fromHex(A)));
    const script = fromHex(`76a914${hash}88ac`);
    const ms = decodeMiniscript(script, Segwitv0, decodeKey);
    expect([...ms.iter()].map(fragment => fragment.node.type)).toContain(
      'raw_pkh'
    );
    expect(toHex(ms.encode())).toBe(toHex(script));
  });

  test('reports opcodes that start no fragment', () => {
    //OP_NOP
    const err = miniscriptError(() =>
      decodeMiniscript(Uint8Array.of(0x61), Segwitv0, decodeKey)
    );
    expect(err.kind).toBe('UnexpectedToken');
    expect(err.message.endsWith(' of 61')).toBe(true);
  });
});

describe('Script contexts', () => {
  test('segwit rejects uncompressed keys', () => {
    expect(
      miniscriptError(() =>
        parseMiniscript(`pk(${A_UNCOMPRESSED})`, Segwitv0, parsePublicKey)
      ).kind
    ).toBe('UncompressedPubkey');
  });

  test('legacy accepts uncompressed keys', () => {
    const ms = parseMiniscript(`pk(${A_UNCOMPRESSED})`, Legacy, parsePublicKey);
    expect(toHex(ms.encode())).toBe(`41${A_UNCOMPRESSED}ac`);
  });

  test('rejects unknown fragments', () => {
    expect(() =>
      parseMiniscript(`pkk(${A})`, Segwitv0, parsePublicKey)
    ).toThrow(MiniscriptError);
  });
});

describe('Sanity checks', () => {
  test('accept a plain key', () => {
    expect(() =>
      parseMiniscript(`pk(${A})`, Segwitv0, parsePublicKey, {
        sanityCheck: true
      })
    ).not.toThrow();
  });

  test('require a signature', () => {
    expect(
      miniscriptError(() =>
        parseMiniscript(`sha256(${'ab'.repeat(32)})`, Segwitv0, parsePublicKey, {
          sanityCheck: true
        })
      ).kind
    ).toBe('SigNotRequired');
  });

  test('reject repeated keys', () => {
    const ms = parseMiniscript(
      `and_v(v:pk(${A}),pk(${A}))`,
      Segwitv0,
      parsePublicKey
    );
    expect(ms.hasRepeatedKeys()).toBe(true);
    expect(miniscriptError(() => ms.sanityCheck()).kind).toBe('RepeatedKeys');
  });
});

describe('Satisfaction', () => {
  test('pushes the signature with its sighash type', () => {
    const sig = fakeSig(0x30);
    const ms = parseMiniscript(`pk(${A})`, Segwitv0, parsePublicKey);
    expect(ms.satisfy(sigSatisfier({ [A]: sig })).map(toHex)).toEqual([
      `${toHex(sig)}01`
    ]);
  });

  test('prefers the branch without a signature', () => {
    const sig = fakeSig(0x31);
    const ms = parseMiniscript(
      `or_d(pk(${A}),older(10))`,
      Segwitv0,
      parsePublicKey
    );
    const sigs = sigSatisfier({ [A]: sig });
    expect(
      ms.satisfy({ ...sigs, checkOlder: n => n === 10 }).map(toHex)
    ).toEqual(['']);
    expect(ms.satisfy({ ...sigs, checkOlder: () => false }).map(toHex)).toEqual(
      [`${toHex(sig)}01`]
    );
  });

  test('satisfies scripts that repeat a key', () => {
    const sig = fakeSig(0x32);
    const ms = parseMiniscript(
      `and_v(v:pk(${A}),pk(${A}))`,
      Segwitv0,
      parsePublicKey
    );
    expect(ms.satisfy(sigSatisfier({ [A]: sig })).map(toHex)).toEqual([
      `${toHex(sig)}01`,
      `${toHex(sig)}01`
    ]);
  });

  test('pushes a known preimage', () => {
    const preimage = new Uint8Array(32).fill(0x07);
    const hash = toHex(sha256(preimage));
    const ms = parseMiniscript(`sha256(${hash})`, Segwitv0, parsePublicKey);
    expect(
      ms
        .satisfy({
          lookupPreimage: (type, digest) =>
            type === 'sha256' && toHex(digest) === hash ? preimage : undefined
        })
        .map(toHex)
    ).toEqual([toHex(preimage)]);
    expect(miniscriptError(() => ms.satisfy({})).kind).toBe('CouldNotSatisfy');
  });

  test('asks the satisfier about absolute timelocks', () => {
    const sig = fakeSig(0x33);
    const ms = parseMiniscript(
      `and_v(v:pk(${A}),after(500))`,
      Segwitv0,
      parsePublicKey
    );
    const sigs = sigSatisfier({ [A]: sig });
    expect(
      ms.satisfy({ ...sigs, checkAfter: n => n <= 600 }).map(toHex)
    ).toEqual([`${toHex(sig)}01`]);
    expect(
      miniscriptError(() => ms.satisfy({ ...sigs, checkAfter: () => false }))
        .kind
    ).toBe('CouldNotSatisfy');
  });

  test('malleable satisfactions take the smallest witness', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const sig = fakeSig(0x34);
    const ms = parseMiniscript(
      `or_d(pk(${A}),older(10))`,
      Segwitv0,
      parsePublicKey
    );
    expect(
      ms
        .satisfyMalleable({
          ...sigSatisfier({ [A]: sig }),
          checkOlder: () => true
        })
        .map(toHex)
    ).toEqual(['']);
    expect(warn).toHaveBeenCalledWith(
      `Warning: using malleable satisfactions for or_d(pk(${A}),older(10))`
    );
    warn.mockRestore();
  });

  test('malleable thresholds skip the subs without a signature', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const sigA = fakeSig(0x35);
    const sigC = fakeSig(0x36);
    const ms = parseMiniscript(
      `thresh(2,pk(${A}),s:pk(${B}),s:pk(${C}))`,
      Segwitv0,
      parsePublicKey
    );
    //the first sub reads the top of the stack
    expect(
      ms.satisfyMalleable(sigSatisfier({ [A]: sigA, [C]: sigC })).map(toHex)
    ).toEqual([`${toHex(sigC)}01`, '', `${toHex(sigA)}01`]);
    warn.mockRestore();
  });

  test('counts the script among the witness elements', () => {
    const ms = parseMiniscript(`pk(${A})`, Segwitv0, parsePublicKey);
    expect(ms.maxSatisfactionWitnessElements()).toBe(2);
  });
});
