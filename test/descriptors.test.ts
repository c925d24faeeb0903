// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { sha256 } from '@noble/hashes/sha2.js';
import { concatBytes } from '@scure/btc-signer/utils.js';
import { DescriptorChecksum } from '../src/checksum.js';
import { Bare, Pkh } from '../src/descriptor/bare.js';
import { descriptorFromString } from '../src/descriptor/descriptor.js';
import {
  preTaprootFromString,
  preTaprootFromTree
} from '../src/descriptor/pretaproot.js';
import { Wpkh, Wsh } from '../src/descriptor/segwitv0.js';
import { Sh } from '../src/descriptor/sh.js';
import { MiniscriptError } from '../src/errors.js';
import { parseTree } from '../src/expression.js';
import {
  KeyName,
  PublicKey,
  parseKeyName,
  parsePublicKey
} from '../src/keys.js';
import { networks } from '../src/networks.js';
import {
  A,
  A_UNCOMPRESSED,
  B,
  C,
  fakeSig,
  fromHex,
  pubkeyHex,
  sigSatisfier,
  toHex
} from './helpers/keys.js';

const withTag = (body: string) => `${body}#${DescriptorChecksum(body)}`;

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof MiniscriptError) return err.kind;
    throw err;
  }
  return undefined;
}

describe('pkh end to end', () => {
  const descriptor = preTaprootFromString(`pkh(${A})`, parsePublicKey);

  test('encodes the p2pkh script of the key hash', () => {
    expect(toHex(descriptor.getScriptPubKey())).toBe(
      '76a914751e76e8199196d454941c45d1b3a323f1433bd688ac'
    );
  });

  test('has a mainnet address by default', () => {
    expect(descriptor.getAddress()).toBe('1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH');
  });

  test('satisfies with a signature and the key in the scriptSig', () => {
    const sig = fakeSig(0x30);
    const { witness, scriptSig } = descriptor.getSatisfaction(
      sigSatisfier({ [A]: sig })
    );
    expect(witness).toEqual([]);
    expect(toHex(scriptSig)).toBe(
      toHex(
        concatBytes(
          Uint8Array.of(72),
          sig,
          Uint8Array.of(1),
          Uint8Array.of(33),
          fromHex(A)
        )
      )
    );
  });

  test('fails without a signature', () => {
    expect(errorKind(() => descriptor.getSatisfaction({}))).toBe('MissingSig');
  });

  test('prints itself with a checksum', () => {
    expect(descriptor.toString()).toBe(withTag(`pkh(${A})`));
  });

  test('bounds the weight of its spend', () => {
    expect(descriptor.maxSatisfactionWeight()).toBe(4 * (1 + 73 + 34));
    const uncompressed = new Pkh(PublicKey.fromHex(A_UNCOMPRESSED));
    expect(uncompressed.maxSatisfactionWeight()).toBe(4 * (1 + 73 + 66));
  });
});

describe('Segwit descriptors', () => {
  test('wpkh encodes a version 0 program', () => {
    const wpkh = Wpkh.fromString(`wpkh(${A})`, parsePublicKey);
    expect(toHex(wpkh.getScriptPubKey())).toBe(
      '0014751e76e8199196d454941c45d1b3a323f1433bd6'
    );
    expect(wpkh.getAddress()).toBe(
      'bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4'
    );
    //segwit v0 key spends sign the p2pkh script
    expect(toHex(wpkh.getScriptCode())).toBe(
      '76a914751e76e8199196d454941c45d1b3a323f1433bd688ac'
    );
    expect(wpkh.maxSatisfactionWeight()).toBe(112);
  });

  test('wpkh puts the signature and the key in the witness', () => {
    const sig = fakeSig(0x31);
    const wpkh = Wpkh.fromString(`wpkh(${A})`, parsePublicKey);
    const { witness, scriptSig } = wpkh.getSatisfaction(
      sigSatisfier({ [A]: sig })
    );
    expect(scriptSig.length).toBe(0);
    expect(witness.map(toHex)).toEqual([
      toHex(concatBytes(sig, Uint8Array.of(1))),
      A
    ]);
  });

  test('wpkh rejects uncompressed keys', () => {
    expect(
      errorKind(() =>
        Wpkh.fromString(`wpkh(${A_UNCOMPRESSED})`, parsePublicKey)
      )
    ).toBe('UncompressedPubkey');
  });

  test('wsh rejects uncompressed keys in its script', () => {
    expect(
      errorKind(() =>
        Wsh.fromString(`wsh(pk(${A_UNCOMPRESSED}))`, parsePublicKey)
      )
    ).toBe('UncompressedPubkey');
  });

  test('wsh commits to the sha256 of its witness script', () => {
    const wsh = Wsh.fromString(`wsh(pk(${A}))`, parsePublicKey);
    const script = `21${A}ac`;
    expect(toHex(wsh.getWitnessScript())).toBe(script);
    expect(toHex(wsh.getScriptPubKey())).toBe(
      toHex(
        btc.OutScript.encode({ type: 'wsh', hash: sha256(fromHex(script)) })
      )
    );
  });

  test('wsh appends the witness script to the satisfaction', () => {
    const sig = fakeSig(0x32);
    const wsh = Wsh.fromString(`wsh(pk(${A}))`, parsePublicKey);
    const { witness } = wsh.getSatisfaction(sigSatisfier({ [A]: sig }));
    expect(witness.map(toHex)).toEqual([
      toHex(concatBytes(sig, Uint8Array.of(1))),
      `21${A}ac`
    ]);
  });

  test('wsh may satisfy malleably with the smallest witness', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const wsh = Wsh.fromString(`wsh(or_d(pk(${A}),older(10)))`, parsePublicKey);
    const { witness } = wsh.getSatisfactionMalleable({
      ...sigSatisfier({ [A]: fakeSig(0x35) }),
      checkOlder: () => true
    });
    //IFDUP NOTIF 10 CHECKSEQUENCEVERIFY ENDIF
    expect(witness.map(toHex)).toEqual(['', `21${A}ac73645ab268`]);
    warn.mockRestore();
  });

  test('wsh satisfies scripts that repeat a key', () => {
    const sig = fakeSig(0x36);
    const wsh = Wsh.fromString(`wsh(and_v(v:pk(${A}),pk(${A})))`, parsePublicKey);
    const { witness } = wsh.getSatisfaction(sigSatisfier({ [A]: sig }));
    expect(witness.map(toHex)).toEqual([
      `${toHex(sig)}01`,
      `${toHex(sig)}01`,
      `21${A}ad21${A}ac`
    ]);
  });

  test('sortedmulti encodes its keys in byte order', () => {
    const sorted = Wsh.fromString(
      `wsh(sortedmulti(2,${C},${A},${B}))`,
      parsePublicKey
    );
    const multi = Wsh.fromString(
      `wsh(multi(2,${A},${B},${C}))`,
      parsePublicKey
    );
    expect(toHex(sorted.getWitnessScript())).toBe(
      toHex(multi.getWitnessScript())
    );
    //the written order is kept
    expect(sorted.toString()).toBe(
      withTag(`wsh(sortedmulti(2,${C},${A},${B}))`)
    );
  });
});

describe('Nested segwit', () => {
  test('sh(wpkh) pushes the witness program in the scriptSig', () => {
    const sig = fakeSig(0x33);
    const sh = Sh.fromString(`sh(wpkh(${A}))`, parsePublicKey);
    const program = '0014751e76e8199196d454941c45d1b3a323f1433bd6';
    expect(toHex(sh.getRedeemScript())).toBe(program);
    expect(toHex(sh.getUnsignedScriptSig())).toBe(`16${program}`);
    const { witness, scriptSig } = sh.getSatisfaction(
      sigSatisfier({ [A]: sig })
    );
    expect(toHex(scriptSig)).toBe(`16${program}`);
    expect(witness.map(toHex)).toEqual([
      toHex(concatBytes(sig, Uint8Array.of(1))),
      A
    ]);
    expect(sh.maxSatisfactionWeight()).toBe(4 * 24 + 1 + 73 + 34);
  });

  test('sh of a legacy script pushes the redeem script last', () => {
    const sig = fakeSig(0x34);
    const sh = Sh.fromString(`sh(pk(${A_UNCOMPRESSED}))`, parsePublicKey);
    const redeemScript = `41${A_UNCOMPRESSED}ac`;
    expect(toHex(sh.getRedeemScript())).toBe(redeemScript);
    const { witness, scriptSig } = sh.getSatisfaction(
      sigSatisfier({ [A_UNCOMPRESSED]: sig })
    );
    expect(witness).toEqual([]);
    expect(toHex(scriptSig)).toBe(
      toHex(concatBytes(Uint8Array.of(72), sig, Uint8Array.of(1))) +
        `43${redeemScript}`
    );
  });
});

describe('Bare descriptors', () => {
  test('have no address', () => {
    const bare = Bare.fromString(`multi(1,${A},${B})`, parsePublicKey);
    expect(errorKind(() => bare.getAddress())).toBe('BareDescriptorAddr');
  });

  test('use the script as the script pubkey', () => {
    const bare = Bare.fromString(`pk(${A})`, parsePublicKey);
    expect(toHex(bare.getScriptPubKey())).toBe(`21${A}ac`);
    expect(toHex(bare.getExplicitScript())).toBe(`21${A}ac`);
  });

  test('return a fresh script pubkey on every call', () => {
    const bare = Bare.fromString(`pk(${A})`, parsePublicKey);
    bare.getScriptPubKey().fill(0);
    expect(toHex(bare.getScriptPubKey())).toBe(`21${A}ac`);
  });

  test('take multisig of up to 3 keys', () => {
    const D = pubkeyHex(4n);
    expect(
      toHex(
        Bare.fromString(`multi(1,${A},${B},${C})`, parsePublicKey).getScriptPubKey()
      )
    ).toBe(`5121${A}21${B}21${C}53ae`);
    expect(
      errorKind(() =>
        Bare.fromString(`multi(1,${A},${B},${C},${D})`, parsePublicKey)
      )
    ).toBe('NonStandardBareScript');
  });

  test('only accept standard bare scripts', () => {
    expect(
      errorKind(() =>
        Bare.fromString(`and_v(v:pk(${A}),pk(${B}))`, parsePublicKey)
      )
    ).toBe('NonStandardBareScript');
  });
});

describe('Pre-taproot dispatch', () => {
  test.each([
    [`pkh(${A})`, 'pkh'],
    [`wpkh(${A})`, 'wpkh'],
    [`sh(wpkh(${A}))`, 'sh'],
    [`wsh(pk(${A}))`, 'wsh'],
    [`pk(${A})`, 'bare'],
    [`multi(1,${A},${B})`, 'bare']
  ])('%s is a %s descriptor', (descriptor, type) => {
    expect(preTaprootFromString(descriptor, parsePublicKey).type).toBe(type);
  });

  test('names with the wrong arity fall back to bare miniscript', () => {
    //pkh(A,B) is not a pkh descriptor: it is parsed as miniscript and fails
    expect(() =>
      preTaprootFromTree(parseTree(`pkh(${A},${B})`), parsePublicKey)
    ).toThrow('Error: pkh takes 1 arguments, got 2');
  });

  test('reports the node that does not match a wrapper', () => {
    expect(() => Wsh.fromString(`sh(pk(${A}))`, parsePublicKey)).toThrow(
      'sh(1 args) while parsing wsh descriptor'
    );
  });
});

describe('Descriptor strings', () => {
  test.each([
    `pkh(${A})`,
    `wpkh(${A})`,
    `sh(wpkh(${A}))`,
    `sh(wsh(or_d(pk(${A}),and_v(v:pk(${B}),older(144)))))`,
    `wsh(sortedmulti(2,${B},${A},${C}))`,
    `sh(sortedmulti(1,${A},${B}))`,
    `elwsh(multi(1,${A},${B}))`,
    `elsh(wpkh(${A}))`,
    `pk(${A})`
  ])('%s round trips', body => {
    const descriptor = descriptorFromString(body, parsePublicKey);
    expect(descriptor.toString()).toBe(withTag(body));
    const reparsed = descriptorFromString(
      descriptor.toString(),
      parsePublicKey,
      { checksumRequired: true }
    );
    expect(reparsed.toString()).toBe(descriptor.toString());
    expect(toHex(reparsed.getScriptPubKey())).toBe(
      toHex(descriptor.getScriptPubKey())
    );
  });

  test('a checksum can be required', () => {
    expect(
      errorKind(() =>
        descriptorFromString(`pkh(${A})`, parsePublicKey, {
          checksumRequired: true
        })
      )
    ).toBe('Checksum');
  });

  test('a mutated body fails its checksum', () => {
    const tagged = withTag(`pkh(${A})`);
    expect(
      errorKind(() =>
        descriptorFromString(tagged.replace('pkh', 'pk'), parsePublicKey)
      )
    ).toBe('Checksum');
  });
});

describe('Elements prefix', () => {
  test('selects the liquid address parameters', () => {
    const plain = preTaprootFromString(`pkh(${A})`, parsePublicKey);
    const elements = preTaprootFromString(`elpkh(${A})`, parsePublicKey);
    expect(elements.elements).toBe(true);
    expect(plain.elements).toBe(false);
    expect(toHex(elements.getScriptPubKey())).toBe(
      toHex(plain.getScriptPubKey())
    );
    expect(elements.getAddress()).toBe(plain.getAddress(networks.liquid));
    expect(elements.getAddress()).not.toBe(plain.getAddress());
  });

  test('liquid segwit addresses use the ex prefix', () => {
    const wpkh = preTaprootFromString(`elwpkh(${A})`, parsePublicKey);
    expect(wpkh.getAddress().startsWith('ex1q')).toBe(true);
  });
});

describe('Keys', () => {
  test('forEachKey stops at the first rejected key', () => {
    const wsh = Wsh.fromString(
      `wsh(multi(2,${A},${B},${C}))`,
      parsePublicKey
    );
    const seen: string[] = [];
    const result = wsh.forEachKey(key => {
      seen.push(key.toString());
      return key.toString() !== B;
    });
    expect(result).toBe(false);
    expect(seen).toEqual([A, B]);
    expect(wsh.forEachKey(() => true)).toBe(true);
  });

  test('translatePk substitutes named keys', () => {
    const keys: Record<string, string> = { alice: A, bob: B };
    const translator = {
      pk: (key: KeyName) => PublicKey.fromHex(keys[key.name] ?? ''),
      pkh: (hash: Uint8Array) => hash
    };
    const named = Wsh.fromString('wsh(or_d(pk(alice),pk(bob)))', parseKeyName);
    const translated = named.translatePk(translator);
    expect(translated.toString()).toBe(
      withTag(`wsh(or_d(pk(${A}),pk(${B})))`)
    );
    const pkh = Pkh.fromString('pkh(alice)', parseKeyName).translatePk(
      translator
    );
    expect(pkh.getAddress()).toBe('1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH');
  });
});
