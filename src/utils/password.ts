import crypto from "node:crypto";

const SALT_BYTES = 16;
const KEY_LENGTH = 64;
const SCHEME = "scrypt";

function scrypt(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(password, salt, KEY_LENGTH, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Digest format: `scrypt$<saltHex>$<hashHex>`.
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.randomBytes(SALT_BYTES);
  const hash = await scrypt(password, salt);
  return [SCHEME, salt.toString("hex"), hash.toString("hex")].join("$");
}

export async function verifyPassword(
  password: string,
  digest: string,
): Promise<boolean> {
  const [scheme, saltHex, hashHex] = digest.split("$");
  if (scheme !== SCHEME || !saltHex || !hashHex) return false;

  const expected = Buffer.from(hashHex, "hex");
  if (expected.length !== KEY_LENGTH) return false;

  const actual = await scrypt(password, Buffer.from(saltHex, "hex"));
  return crypto.timingSafeEqual(actual, expected);
}
