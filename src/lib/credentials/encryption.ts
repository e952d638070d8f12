/**
 * Symmetric encryption for provider secrets at rest.
 * Tokens use the Fernet layout (AES-128-CBC + HMAC-SHA256, base64url) with the
 * key derived as sha256(masterKey), so tokens written by earlier deployments
 * keep decrypting.
 */

import { createCipheriv, createDecipheriv, createHash, createHmac, randomBytes, timingSafeEqual } from "crypto";

const VERSION = 0x80;
const HEADER_LEN = 1 + 8 + 16;
const HMAC_LEN = 32;
const BLOCK_LEN = 16;

export class InvalidTokenError extends Error {
  override readonly name = "InvalidTokenError";

  constructor(message = "Invalid credential token") {
    super(message);
  }
}

function toBase64UrlPadded(buf: Buffer): string {
  const s = buf.toString("base64url");
  return s + "=".repeat((4 - (s.length % 4)) % 4);
}

export class EncryptionService {
  private readonly signingKey: Buffer;
  private readonly encryptionKey: Buffer;

  constructor(masterKey: string) {
    const derived = createHash("sha256").update(masterKey, "utf8").digest();
    this.signingKey = derived.subarray(0, 16);
    this.encryptionKey = derived.subarray(16, 32);
  }

  encrypt(plaintext: string, nowMs: number = Date.now()): string {
    const iv = randomBytes(16);
    const cipher = createCipheriv("aes-128-cbc", this.encryptionKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
    const header = Buffer.alloc(9);
    header.writeUInt8(VERSION, 0);
    header.writeBigUInt64BE(BigInt(Math.floor(nowMs / 1000)), 1);
    const body = Buffer.concat([header, iv, ciphertext]);
    const mac = createHmac("sha256", this.signingKey).update(body).digest();
    return toBase64UrlPadded(Buffer.concat([body, mac]));
  }

  /** Throws InvalidTokenError when the token is malformed, tampered with, or from another key. */
  decrypt(token: string): string {
    const raw = Buffer.from(token, "base64url");
    if (raw.length < HEADER_LEN + BLOCK_LEN + HMAC_LEN || raw[0] !== VERSION) {
      throw new InvalidTokenError();
    }
    const body = raw.subarray(0, raw.length - HMAC_LEN);
    const mac = raw.subarray(raw.length - HMAC_LEN);
    const expected = createHmac("sha256", this.signingKey).update(body).digest();
    if (!timingSafeEqual(mac, expected)) {
      throw new InvalidTokenError();
    }
    const ciphertext = body.subarray(HEADER_LEN);
    if (ciphertext.length % BLOCK_LEN !== 0) {
      throw new InvalidTokenError();
    }
    const iv = body.subarray(9, HEADER_LEN);
    try {
      const decipher = createDecipheriv("aes-128-cbc", this.encryptionKey, iv);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
    } catch {
      throw new InvalidTokenError();
    }
  }
}
