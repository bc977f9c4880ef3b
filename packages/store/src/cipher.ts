import crypto from "node:crypto";
import { ConfigurationError } from "./errors.js";

// Fernet tokens: existing deployments wrote their state files in this format.
// version(1) | timestamp(8, big-endian seconds) | iv(16) | AES-128-CBC ciphertext | HMAC-SHA256(32)

const VERSION = 0x80;
const HEADER_BYTES = 1 + 8 + 16;
const HMAC_BYTES = 32;
const BLOCK_BYTES = 16;

export type DecryptResult =
  | { ok: true; plaintext: Buffer }
  | { ok: false; reason: "empty" | "malformed" | "bad_signature" };

function toUrlSafeBase64(buf: Buffer): string {
  return buf.toString("base64").replaceAll("+", "-").replaceAll("/", "_");
}

function decodeUrlSafeBase64(input: string): Buffer | null {
  if (!/^[A-Za-z0-9_-]+={0,2}$/.test(input)) return null;
  return Buffer.from(input, "base64url");
}

export class Cipher {
  private readonly signingKey: Buffer;
  private readonly encryptionKey: Buffer;

  constructor(key: string) {
    const raw = decodeUrlSafeBase64(key.trim());
    if (!raw || raw.length !== 32) {
      throw new ConfigurationError("Secret key must be 32 bytes encoded as URL-safe base64 (44 characters).");
    }
    this.signingKey = raw.subarray(0, 16);
    this.encryptionKey = raw.subarray(16);
  }

  static generateKey(): string {
    return toUrlSafeBase64(crypto.randomBytes(32));
  }

  encrypt(plaintext: Buffer, now: Date = new Date()): Buffer {
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv("aes-128-cbc", this.encryptionKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

    const header = Buffer.alloc(9);
    header.writeUInt8(VERSION, 0);
    header.writeBigUInt64BE(BigInt(Math.floor(now.getTime() / 1000)), 1);

    const body = Buffer.concat([header, iv, ciphertext]);
    const mac = crypto.createHmac("sha256", this.signingKey).update(body).digest();
    return Buffer.from(toUrlSafeBase64(Buffer.concat([body, mac])), "ascii");
  }

  decrypt(token: Buffer): DecryptResult {
    const text = token.toString("ascii").trim();
    if (!text) return { ok: false, reason: "empty" };

    const data = decodeUrlSafeBase64(text);
    if (!data || data.length < HEADER_BYTES + BLOCK_BYTES + HMAC_BYTES || data[0] !== VERSION) {
      return { ok: false, reason: "malformed" };
    }
    if ((data.length - HEADER_BYTES - HMAC_BYTES) % BLOCK_BYTES !== 0) {
      return { ok: false, reason: "malformed" };
    }

    const body = data.subarray(0, data.length - HMAC_BYTES);
    const mac = data.subarray(data.length - HMAC_BYTES);
    const expected = crypto.createHmac("sha256", this.signingKey).update(body).digest();
    if (!crypto.timingSafeEqual(mac, expected)) return { ok: false, reason: "bad_signature" };

    const iv = body.subarray(9, HEADER_BYTES);
    const ciphertext = body.subarray(HEADER_BYTES);
    try {
      const decipher = crypto.createDecipheriv("aes-128-cbc", this.encryptionKey, iv);
      return { ok: true, plaintext: Buffer.concat([decipher.update(ciphertext), decipher.final()]) };
    } catch {
      // bad PKCS#7 padding under a valid MAC
      return { ok: false, reason: "malformed" };
    }
  }
}
