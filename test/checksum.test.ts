// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { DescriptorChecksum, verifyChecksum } from '../src/checksum.js';
import { MiniscriptError } from '../src/errors.js';
import { parseTree, treeToString } from '../src/expression.js';

describe('Descriptor checksums', () => {
  test('computes the BIP380 checksum', () => {
    expect(DescriptorChecksum('raw(deadbeef)')).toBe('89f8spxm');
  });

  test('returns the body of a tagged descriptor', () => {
    expect(verifyChecksum('raw(deadbeef)#89f8spxm')).toBe('raw(deadbeef)');
    expect(
      verifyChecksum('raw(deadbeef)#89f8spxm', { checksumRequired: true })
    ).toBe('raw(deadbeef)');
  });

  test('accepts untagged descriptors unless the tag is required', () => {
    expect(verifyChecksum('raw(deadbeef)')).toBe('raw(deadbeef)');
    expect(() =>
      verifyChecksum('raw(deadbeef)', { checksumRequired: true })
    ).toThrow('Error: descriptor raw(deadbeef) has no checksum');
  });

  test('rejects a mutated tag', () => {
    const tag = DescriptorChecksum('raw(deadbeef)');
    for (let i = 0; i < tag.length; i++) {
      const mutated =
        tag.slice(0, i) + (tag[i] === 'q' ? 'p' : 'q') + tag.slice(i + 1);
      expect(() => verifyChecksum(`raw(deadbeef)#${mutated}`)).toThrow(
        MiniscriptError
      );
    }
  });

  test('rejects a mutated body', () => {
    expect(() => verifyChecksum('raw(deadbeee)#89f8spxm')).toThrow(
      'Error: invalid descriptor checksum for raw(deadbeee)#89f8spxm'
    );
  });

  test('rejects an empty tag and repeated separators', () => {
    expect(() => verifyChecksum('raw(deadbeef)#')).toThrow(MiniscriptError);
    expect(() => verifyChecksum('raw(deadbeef)#89f8spxm#89f8spxm')).toThrow(
      "Error: multiple '#' separators in raw(deadbeef)#89f8spxm#89f8spxm"
    );
  });

  test('rejects characters outside the descriptor charset', () => {
    let error: unknown;
    try {
      verifyChecksum('raw(deadbeef)é');
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(MiniscriptError);
    expect(error instanceof MiniscriptError && error.kind).toBe('Checksum');
  });
});

describe('Expression trees', () => {
  test('parses nested nodes', () => {
    expect(parseTree('wsh(and_v(v:pk(A),older(10)))')).toEqual({
      name: 'wsh',
      args: [
        {
          name: 'and_v',
          args: [
            { name: 'v:pk', args: [{ name: 'A', args: [] }] },
            { name: 'older', args: [{ name: '10', args: [] }] }
          ]
        }
      ]
    });
  });

  test('prints what it parses', () => {
    const expression = 'sh(wsh(or_d(pk(A),and_v(v:pk(B),older(144)))))';
    expect(treeToString(parseTree(expression))).toBe(expression);
  });

  test('rejects unbalanced input', () => {
    expect(() => parseTree('pk(A')).toThrow(MiniscriptError);
    expect(() => parseTree('pk(A))')).toThrow(
      "Error: unexpected ')' at position 5 in pk(A))"
    );
  });
});
