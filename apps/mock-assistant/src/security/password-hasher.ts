/**
 * Scrypt password hasher
 *
 * Output format: `scrypt$<salt hex>$<key hex>`.
 */

import { randomBytes, scrypt, timingSafeEqual } from "crypto";
import type { PasswordHasher } from "@mockpilot/engine";

const SALT_BYTES = 16;
const KEY_LENGTH = 32;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        scrypt(password, salt, KEY_LENGTH, (error, key) => {
            if (error) {
                reject(error);
            }
            else {
                resolve(key);
            }
        });
    });
}

export class ScryptPasswordHasher implements PasswordHasher {
    async hash(password: string): Promise<string> {
        const salt = randomBytes(SALT_BYTES);
        const key = await deriveKey(password, salt);
        return `scrypt$${salt.toString("hex")}$${key.toString("hex")}`;
    }

    /**
     * Check a password against a hash produced by {@link hash}.
     */
    async verify(password: string, stored: string): Promise<boolean> {
        const [scheme, saltHex, keyHex] = stored.split("$");
        if (scheme !== "scrypt" || !saltHex || !keyHex) {
            return false;
        }

        const expected = Buffer.from(keyHex, "hex");
        const actual = await deriveKey(password, Buffer.from(saltHex, "hex"));
        return expected.length === actual.length && timingSafeEqual(expected, actual);
    }
}
