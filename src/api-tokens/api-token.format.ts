import { randomBytes } from 'crypto';

export const TOKEN_PREFIX = 'gf_';
export const TOKEN_PREFIX_LENGTH = 8;
export const TOKEN_RANDOM_BYTES = 32;

/** Anything starting with `gf_` is an opaque API token */
export function isOpaqueToken(raw: string): boolean {
  return raw.startsWith(TOKEN_PREFIX);
}

/**
 * Lookup prefix of `gf_<8 hex>_<rest>`, or null when the token is too short
 * to carry one.
 */
export function extractTokenPrefix(raw: string): string | null {
  if (!isOpaqueToken(raw)) {
    return null;
  }
  const body = raw.slice(TOKEN_PREFIX.length);
  if (body.length < TOKEN_PREFIX_LENGTH + 1) {
    return null;
  }
  return body.slice(0, TOKEN_PREFIX_LENGTH);
}

export function generateRawToken(): { raw: string; prefix: string } {
  const random = randomBytes(TOKEN_RANDOM_BYTES).toString('hex');
  const prefix = random.slice(0, TOKEN_PREFIX_LENGTH);
  return {
    raw: `${TOKEN_PREFIX}${prefix}_${random.slice(TOKEN_PREFIX_LENGTH)}`,
    prefix,
  };
}

const DAY_MS = 24 * 60 * 60 * 1000;
const EXPIRY_UNITS: Record<string, number> = {
  d: DAY_MS,
  m: 30 * DAY_MS,
  y: 365 * DAY_MS,
};

/** Longest lifetime a token may be issued with */
export const MAX_TOKEN_LIFETIME_MS = 100 * EXPIRY_UNITS.y;

/**
 * Expiry for `30d`, `3m`, `1y` style lifetimes of up to 100 years. `never` or
 * empty gives null; anything else gives undefined.
 */
export function parseExpiresIn(
  value: string | undefined,
  now: Date,
): Date | null | undefined {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === '' || normalized === 'never') {
    return null;
  }
  const match = /^(\d+)([dmy])$/.exec(normalized);
  if (!match) {
    return undefined;
  }
  const amount = parseInt(match[1], 10);
  const lifetimeMs = amount * EXPIRY_UNITS[match[2]];
  if (amount <= 0 || lifetimeMs > MAX_TOKEN_LIFETIME_MS) {
    return undefined;
  }
  return new Date(now.getTime() + lifetimeMs);
}
