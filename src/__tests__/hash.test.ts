/**
 * Hash function tests
 *
 * These are the foundation: if hashing is wrong, everything is wrong.
 */

import { createHash } from 'node:crypto';
import {
  hashBytes,
  sha256,
  sha256Hex,
  sha256Truncated,
  nix32Encode,
  nix32Decode,
  encodeDigest,
  toSRI,
  computeStorePath,
  computeFixedOutputPath,
} from '../core/hash';

describe('SHA256', () => {
  it('produces correct hash for empty string', () => {
    // Known SHA256 of empty string
    expect(sha256Hex('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('produces correct hash for "hello"', () => {
    expect(sha256Hex('hello')).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });

  it('handles Buffer input', () => {
    const buf = Buffer.from('hello');
    expect(sha256Hex(buf)).toBe(sha256Hex('hello'));
  });
});

describe('hashBytes', () => {
  it('uses the requested algorithm', () => {
    expect(hashBytes('sha1', 'hello').toString('hex')).toBe(
      'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d'
    );
    expect(hashBytes('sha512', 'hello').length).toBe(64);
    expect(hashBytes('sha256', 'hello')).toEqual(sha256('hello'));
  });
});

describe('Nix32 Encoding', () => {
  // Nix32 alphabet: 0123456789abcdfghijklmnpqrsvwxyz
  // (no e, o, u, t)

  it('uses correct alphabet', () => {
    const result = nix32Encode(Buffer.alloc(20, 0xff));
    expect(result).toMatch(/^[0-9a-df-np-sv-z]+$/);
    expect(result).not.toMatch(/[eout]/);
  });

  it('produces correct length for various inputs', () => {
    // n bytes → ceil(n * 8 / 5) chars
    expect(nix32Encode(Buffer.alloc(0)).length).toBe(0);
    expect(nix32Encode(Buffer.alloc(1)).length).toBe(2);
    expect(nix32Encode(Buffer.alloc(20)).length).toBe(32);
    expect(nix32Encode(Buffer.alloc(32)).length).toBe(52);
  });

  it('handles all-zeros and all-ones', () => {
    expect(nix32Encode(Buffer.alloc(20, 0))).toBe('00000000000000000000000000000000');
    expect(nix32Encode(Buffer.alloc(20, 0xff))).toBe('zzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzz');
  });

  it('takes low bits from the first byte and writes them last', () => {
    expect(nix32Encode(Buffer.from([0x01, 0x00]))).toBe('0001');
    expect(nix32Encode(Buffer.from([0x00, 0x01]))).toBe('0080');
  });

  it('decodes what it encodes', () => {
    const digest = sha256('decode me');
    expect(nix32Decode(nix32Encode(digest), 32)).toEqual(digest);
  });

  it('rejects invalid input when decoding', () => {
    // wrong length for 32 bytes
    expect(nix32Decode('0001', 32)).toBeNull();
    // 'e' is not in the alphabet
    expect(nix32Decode('e'.repeat(52), 32)).toBeNull();
    // top character carries bits beyond 256
    expect(nix32Decode('z' + '0'.repeat(51), 32)).toBeNull();
  });
});

describe('sha256Truncated', () => {
  it('truncates to first 20 bytes before encoding', () => {
    const full = sha256('test');
    expect(sha256Truncated('test')).toBe(nix32Encode(full.subarray(0, 20)));
    expect(sha256Truncated('test').length).toBe(32);
  });
});

describe('Digest encodings', () => {
  const digest = createHash('sha256').update('').digest();

  it('renders SRI', () => {
    expect(toSRI(digest, 'sha256')).toBe('sha256-47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=');
  });

  it('renders every encoding', () => {
    expect(encodeDigest(digest, 'sha256', 'hex')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
    expect(encodeDigest(digest, 'sha256', 'base64')).toBe('47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=');
    expect(encodeDigest(digest, 'sha256', 'nix32')).toBe(nix32Encode(digest));
  });
});

describe('Store Path Computation', () => {
  const storeDir = '/hostfetch/store';
  const content = sha256('content');

  describe('computeStorePath', () => {
    it('follows the fingerprint format', () => {
      const innerDigest = sha256Hex('inner');
      const path = computeStorePath('output:out', innerDigest, storeDir, 'hello');

      expect(path).toMatch(/^\/hostfetch\/store\/[0-9a-df-np-sv-z]{32}-hello$/);
      expect(path).toBe(
        `${storeDir}/${sha256Truncated(`output:out:sha256:${innerDigest}:${storeDir}:hello`)}-hello`
      );
    });

    it('produces different paths for different names and store dirs', () => {
      const digest = sha256Hex('inner');
      const base = computeStorePath('output:out', digest, storeDir, 'foo');
      expect(computeStorePath('output:out', digest, storeDir, 'bar')).not.toBe(base);
      expect(computeStorePath('output:out', digest, '/other/store', 'foo')).not.toBe(base);
    });

    it('leaves the name out when none is given', () => {
      const innerDigest = sha256Hex('inner');
      expect(computeStorePath('output:out', innerDigest, storeDir)).toBe(
        `${storeDir}/${sha256Truncated(`output:out:sha256:${innerDigest}:${storeDir}`)}`
      );
    });
  });

  describe('computeFixedOutputPath', () => {
    it('depends only on algorithm, mode and digest', () => {
      const path1 = computeFixedOutputPath('sha256', content, 'flat', storeDir);
      const path2 = computeFixedOutputPath('sha256', Buffer.from(content), 'flat', storeDir);
      expect(path1).toBe(path2);
      expect(path1).toMatch(/^\/hostfetch\/store\/[0-9a-df-np-sv-z]{32}$/);
    });

    it('produces different paths for different hash modes', () => {
      const flat = computeFixedOutputPath('sha256', content, 'flat', storeDir);
      const recursive = computeFixedOutputPath('sha256', content, 'recursive', storeDir);
      expect(flat).not.toBe(recursive);
    });

    it('produces different paths for different content', () => {
      const a = computeFixedOutputPath('sha256', sha256('a'), 'flat', storeDir);
      const b = computeFixedOutputPath('sha256', sha256('b'), 'flat', storeDir);
      expect(a).not.toBe(b);
    });

    it('builds on the fixed-output fingerprint', () => {
      const inner = sha256Hex(`fixed:out:r:sha256:${content.toString('hex')}:`);
      expect(computeFixedOutputPath('sha256', content, 'recursive', storeDir)).toBe(
        computeStorePath('output:out', inner, storeDir)
      );
    });
  });
});
