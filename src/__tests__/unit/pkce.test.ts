import { describe, it, expect } from 'vitest';
import { computeCodeChallenge, verifyCodeChallenge } from '../../crypto/pkce.js';

describe('PKCE', () => {
  it('should compute S256 challenges', () => {
    expect(computeCodeChallenge('abc123', 'S256')).toBe('bKE9UspwyIPg8LsQHkJaiehiTeUdstI5JZOvaoQRgJA');
  });

  it('should compute S512 challenges', () => {
    expect(computeCodeChallenge('abc123', 'S512')).toBe(
      'xwtd2ev7b1HQnUEytxcMnSB1CnhS8AaA9lZY8DEOgQBW5nY8NMmgCw6UAHb1RJXBafwjAszrMSA5JxxDRpUH3A'
    );
  });

  it('should pass plain verifiers through', () => {
    expect(computeCodeChallenge('abc123', 'plain')).toBe('abc123');
  });

  it('should verify a matching verifier', () => {
    expect(verifyCodeChallenge('abc123', 'bKE9UspwyIPg8LsQHkJaiehiTeUdstI5JZOvaoQRgJA', 'S256')).toBe(true);
  });

  it('should compare challenges case-insensitively', () => {
    expect(verifyCodeChallenge('abc123', 'BKE9USPWYIPG8LSQHKJAIEHITEUDSTI5JZOVAOQRGJA', 'S256')).toBe(true);
    expect(verifyCodeChallenge('ABC123', 'abc123', 'plain')).toBe(true);
  });

  it('should reject a mismatched verifier', () => {
    expect(computeCodeChallenge('wrong', 'S256')).toBe('iBCtWB5Z8rw5KLJhcHpxMI9-E56wSCA2bcTVwY2YAiU');
    expect(verifyCodeChallenge('wrong', 'bKE9UspwyIPg8LsQHkJaiehiTeUdstI5JZOvaoQRgJA', 'S256')).toBe(false);
  });
});
