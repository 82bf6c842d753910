import { describe, it, expect } from 'vitest';
import {
  isValidEthereumAddress,
  normalizeAddress,
  shortAddress,
  parseUserAddresses,
} from '../../src/utils/address.js';

const ADDR_A = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01';
const ADDR_B = '0x1111111111111111111111111111111111111111';

describe('Address Utilities', () => {
  describe('isValidEthereumAddress', () => {
    it('should accept 40 hex characters with or without 0x', () => {
      expect(isValidEthereumAddress(ADDR_A)).toBe(true);
      expect(isValidEthereumAddress(ADDR_B.slice(2))).toBe(true);
    });

    it('should reject wrong lengths and non-hex characters', () => {
      expect(isValidEthereumAddress('0x1234')).toBe(false);
      expect(isValidEthereumAddress('0xZZZZ111111111111111111111111111111111111')).toBe(false);
    });
  });

  describe('normalizeAddress', () => {
    it('should lower-case and trim', () => {
      expect(normalizeAddress(`  ${ADDR_A} `)).toBe('0xabcdef0123456789abcdef0123456789abcdef01');
    });

    it('should add a missing 0x prefix', () => {
      expect(normalizeAddress(ADDR_B.slice(2))).toBe(ADDR_B);
    });
  });

  describe('shortAddress', () => {
    it('should keep the prefix and the last four characters', () => {
      expect(shortAddress(ADDR_B)).toBe('0x1111...1111');
      expect(shortAddress(ADDR_A)).toBe('0xAbCd...Ef01');
    });

    it('should leave short strings alone', () => {
      expect(shortAddress('0x1234')).toBe('0x1234');
    });
  });

  describe('parseUserAddresses', () => {
    it('should parse a comma-separated list', () => {
      expect(parseUserAddresses(`${ADDR_A}, ${ADDR_B}`)).toEqual([
        '0xabcdef0123456789abcdef0123456789abcdef01',
        ADDR_B,
      ]);
    });

    it('should parse a JSON array', () => {
      expect(parseUserAddresses(JSON.stringify([ADDR_B]))).toEqual([ADDR_B]);
    });

    it('should return an empty list for blank input', () => {
      expect(parseUserAddresses('')).toEqual([]);
    });

    it('should reject an invalid entry', () => {
      expect(() => parseUserAddresses(`${ADDR_B},0x1234`)).toThrow(
        'Invalid Ethereum address in USER_ADDRESSES: 0x1234'
      );
    });

    it('should reject malformed JSON', () => {
      expect(() => parseUserAddresses('[0x12,')).toThrow();
      expect(() => parseUserAddresses('[1, 2]')).toThrow('Invalid JSON format for USER_ADDRESSES');
    });
  });
});
