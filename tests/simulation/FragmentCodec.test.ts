import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../simulation/engine/errors.js';
import { decodeFragment, encodeFragment, FRAGMENT_HEADER_BYTES } from '../../simulation/transport/FragmentCodec.js';

describe('FragmentCodec', () => {
  it('prefixes the body with class index and sequence, big-endian', () => {
    const frame = encodeFragment(3, 7, Uint8Array.from([0xaa, 0xbb]));

    expect([...frame]).toEqual([0, 3, 0, 7, 0xaa, 0xbb]);
  });

  it('reads back the header fields and body', () => {
    const decoded = decodeFragment(encodeFragment(4, 0xffff, Uint8Array.from([1, 2, 3])));

    expect(decoded?.classIndex).toBe(4);
    expect(decoded?.sequence).toBe(0xffff);
    expect([...(decoded?.body ?? [])]).toEqual([1, 2, 3]);
  });

  it('decodes a frame that is a view into a larger buffer', () => {
    const backing = new Uint8Array(16);
    backing.set(encodeFragment(1, 2, Uint8Array.from([9])), 5);

    const decoded = decodeFragment(backing.subarray(5, 5 + FRAGMENT_HEADER_BYTES + 1));

    expect(decoded?.classIndex).toBe(1);
    expect(decoded?.sequence).toBe(2);
    expect([...(decoded?.body ?? [])]).toEqual([9]);
  });

  it('returns null for a frame shorter than the header', () => {
    expect(decodeFragment(Uint8Array.from([0, 1, 2]))).toBeNull();
  });

  it('rejects values that do not fit in sixteen bits', () => {
    expect(() => encodeFragment(0x10000, 0, new Uint8Array(0))).toThrow(ConfigurationError);
    expect(() => encodeFragment(0, 0x10000, new Uint8Array(0))).toThrow(ConfigurationError);
    expect(() => encodeFragment(-1, 0, new Uint8Array(0))).toThrow(ConfigurationError);
  });
});
