/**
 * Password hashing and verification utilities
 * Uses Node's built-in scrypt (memory-hard, salted) so no native addons are needed.
 *
 * Encoded form: scrypt$<N>$<r>$<p>$<salt b64>$<key b64>
 * Every parameter verification needs travels inside the credential.
 */
import { randomBytes, scrypt as scryptCallback, timingSafeEqual, type ScryptOptions } from 'node:crypto';
import {
  PASSWORD_HASH_ALGORITHM,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_COST,
  SCRYPT_KEY_LENGTH,
  SCRYPT_PARALLELIZATION,
  SCRYPT_SALT_BYTES,
} from './constants.js';

// Upper bounds keep a crafted credential from requesting unbounded CPU or memory
const MAX_COST = 2 ** 17;
const MAX_BLOCK_SIZE = 16;
const MAX_PARALLELIZATION = 16;
const MAX_KEY_LENGTH = 256;

type ScryptParameters = {
  cost: number;
  blockSize: number;
  parallelization: number;
};

function scrypt(
  password: string,
  salt: Buffer,
  keyLength: number,
  params: ScryptParameters
): Promise<Buffer> {
  const options: ScryptOptions = {
    N: params.cost,
    r: params.blockSize,
    p: params.parallelization,
    // 128 * N * r bytes of working memory, plus headroom
    maxmem: 256 * params.cost * params.blockSize,
  };

  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });
}

/**
 * Hash a password using scrypt with a fresh random salt
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_BYTES);
  const params: ScryptParameters = {
    cost: SCRYPT_COST,
    blockSize: SCRYPT_BLOCK_SIZE,
    parallelization: SCRYPT_PARALLELIZATION,
  };
  const derivedKey = await scrypt(password, salt, SCRYPT_KEY_LENGTH, params);

  return [
    PASSWORD_HASH_ALGORITHM,
    params.cost,
    params.blockSize,
    params.parallelization,
    salt.toString('base64'),
    derivedKey.toString('base64'),
  ].join('$');
}

function parseBoundedInteger(raw: string, max: number): number | null {
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value < 1 || value > max) {
    return null;
  }
  return value;
}

function isPowerOfTwo(value: number): boolean {
  return value > 1 && (value & (value - 1)) === 0;
}

/**
 * Verify a password against a stored scrypt credential.
 * Constant-time comparison; a malformed credential yields false, never an exception.
 */
export async function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  const parts = hashedPassword.split('$');
  if (parts.length !== 6 || parts[0] !== PASSWORD_HASH_ALGORITHM) {
    return false;
  }

  const [, costStr, blockSizeStr, parallelizationStr, saltB64, keyB64] = parts as [
    string,
    string,
    string,
    string,
    string,
    string,
  ];

  const cost = parseBoundedInteger(costStr, MAX_COST);
  const blockSize = parseBoundedInteger(blockSizeStr, MAX_BLOCK_SIZE);
  const parallelization = parseBoundedInteger(parallelizationStr, MAX_PARALLELIZATION);
  if (cost === null || blockSize === null || parallelization === null || !isPowerOfTwo(cost)) {
    return false;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const storedKey = Buffer.from(keyB64, 'base64');
  if (salt.length === 0 || storedKey.length === 0 || storedKey.length > MAX_KEY_LENGTH) {
    return false;
  }

  try {
    const derivedKey = await scrypt(password, salt, storedKey.length, {
      cost,
      blockSize,
      parallelization,
    });
    return timingSafeEqual(storedKey, derivedKey);
  } catch {
    // scrypt rejects parameter combinations beyond its own limits
    return false;
  }
}
