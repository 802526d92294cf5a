import {
  extractTokenPrefix,
  generateRawToken,
  isOpaqueToken,
  parseExpiresIn,
} from './api-token.format';

describe('api token format', () => {
  it('should classify tokens by the gf_ marker', () => {
    expect(isOpaqueToken('gf_a1b2c3d4_rest')).toBe(true);
    expect(isOpaqueToken('eyJhbGciOiJIUzI1NiJ9.e30.sig')).toBe(false);
  });

  it('should extract the eight character prefix', () => {
    expect(extractTokenPrefix('gf_a1b2c3d4_rest')).toBe('a1b2c3d4');
    expect(extractTokenPrefix('gf_a1b2c3d4x')).toBe('a1b2c3d4');
  });

  it('should reject tokens too short to carry a prefix', () => {
    expect(extractTokenPrefix('gf_a1b2c3d4')).toBeNull();
    expect(extractTokenPrefix('gf_')).toBeNull();
  });

  it('should generate tokens whose prefix matches the stored prefix', () => {
    const { raw, prefix } = generateRawToken();

    expect(raw).toMatch(/^gf_[0-9a-f]{8}_[0-9a-f]{56}$/);
    expect(extractTokenPrefix(raw)).toBe(prefix);
  });

  it('should parse lifetimes', () => {
    const now = new Date('2026-01-01T00:00:00.000Z');

    expect(parseExpiresIn('30d', now)).toEqual(
      new Date('2026-01-31T00:00:00.000Z'),
    );
    expect(parseExpiresIn('1y', now)).toEqual(
      new Date('2027-01-01T00:00:00.000Z'),
    );
    expect(parseExpiresIn('never', now)).toBeNull();
    expect(parseExpiresIn(undefined, now)).toBeNull();
    expect(parseExpiresIn('0d', now)).toBeUndefined();
    expect(parseExpiresIn('2w', now)).toBeUndefined();
  });

  it('should cap lifetimes at one hundred years', () => {
    const now = new Date('2026-01-01T00:00:00.000Z');

    expect(parseExpiresIn('100y', now)).toEqual(
      new Date(now.getTime() + 36500 * 24 * 60 * 60 * 1000),
    );
    expect(parseExpiresIn('1200m', now)).toBeInstanceOf(Date);
    expect(parseExpiresIn('101y', now)).toBeUndefined();
    expect(parseExpiresIn('300000y', now)).toBeUndefined();
    expect(parseExpiresIn('99999999999999999999d', now)).toBeUndefined();
  });
});
