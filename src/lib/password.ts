import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

const KEY_LENGTH = 64;
const SCRYPT_PARAMS = { N: 16384, r: 8, p: 1 };

function deriveKey(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, SCRYPT_PARAMS, (err, derived) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(derived);
    });
  });
}

/**
 * Hashes a password with scrypt and a fresh random salt.
 * The digest is `scrypt$<salt hex>$<hash hex>`.
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16).toString('hex');
  const hash = await deriveKey(password, salt);
  return `scrypt$${salt}$${hash.toString('hex')}`;
}

export async function verifyPassword(
  password: string,
  digest: string,
): Promise<boolean> {
  const [scheme, salt, hash] = digest.split('$');
  if (scheme !== 'scrypt' || !salt || !hash) {
    return false;
  }

  const stored = Buffer.from(hash, 'hex');
  if (stored.length !== KEY_LENGTH) {
    return false;
  }

  const derived = await deriveKey(password, salt);
  return timingSafeEqual(derived, stored);
}
