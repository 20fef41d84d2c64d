import { pbkdf2, randomBytes, timingSafeEqual } from 'crypto';
import { promisify } from 'util';

const pbkdf2Async = promisify(pbkdf2);

export const DEFAULT_ITERATIONS = 120000;

const SALT_BYTES = 16;
const KEY_BYTES = 32;
const DIGEST = 'sha256';
const TOKEN_BYTES = 32;

// Node rejects larger counts with a RangeError.
export const MAX_ITERATIONS = 2 ** 31 - 1;

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;
const ITERATIONS_PATTERN = /^[0-9]+$/;

/**
 * Derives a salted PBKDF2-HMAC-SHA256 hash encoded as
 * `<iterations>$<salt-hex>$<hash-hex>`, so a hash stays verifiable after the
 * default iteration count is raised.
 */
export async function hashPassword(
  password: string,
  iterations: number = DEFAULT_ITERATIONS
): Promise<string> {
  if (typeof password !== 'string') {
    throw new TypeError('Password must be a string');
  }
  if (!Number.isInteger(iterations) || iterations < 1 || iterations > MAX_ITERATIONS) {
    throw new RangeError(`Invalid iteration count: ${iterations}`);
  }

  const salt = randomBytes(SALT_BYTES);
  const derived = await pbkdf2Async(password, salt, iterations, KEY_BYTES, DIGEST);
  return `${iterations}$${salt.toString('hex')}$${derived.toString('hex')}`;
}

interface ParsedHash {
  iterations: number;
  salt: Buffer;
  hash: Buffer;
}

function parseEncodedHash(encoded: string): ParsedHash | null {
  const parts = encoded.split('$');
  if (parts.length !== 3) {
    return null;
  }
  const [iterationText = '', saltHex = '', hashHex = ''] = parts;

  if (!ITERATIONS_PATTERN.test(iterationText)) {
    return null;
  }
  const iterations = Number(iterationText);
  if (iterations < 1 || iterations > MAX_ITERATIONS) {
    return null;
  }
  if (!HEX_PATTERN.test(saltHex) || !HEX_PATTERN.test(hashHex)) {
    return null;
  }

  return {
    iterations,
    salt: Buffer.from(saltHex, 'hex'),
    hash: Buffer.from(hashHex, 'hex'),
  };
}

/**
 * Checks a password against an encoded hash. A corrupt or foreign hash
 * yields `false`.
 */
export async function verifyPassword(
  encoded: string,
  password: string
): Promise<boolean> {
  if (typeof encoded !== 'string' || typeof password !== 'string') {
    return false;
  }

  const parsed = parseEncodedHash(encoded);
  if (parsed === null || parsed.hash.length !== KEY_BYTES) {
    return false;
  }

  const candidate = await pbkdf2Async(
    password,
    parsed.salt,
    parsed.iterations,
    KEY_BYTES,
    DIGEST
  );
  return timingSafeEqual(candidate, parsed.hash);
}

export function generateSessionToken(): string {
  return randomBytes(TOKEN_BYTES).toString('hex');
}
