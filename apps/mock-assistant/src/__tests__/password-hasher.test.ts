/**
 * @fileoverview Unit tests for the scrypt password hasher
 *
 * @module security/__tests__/password-hasher
 */

import { describe, it, expect } from "vitest";
import { ScryptPasswordHasher } from "../security/password-hasher.js";

describe("ScryptPasswordHasher", () => {
    const hasher = new ScryptPasswordHasher();

    // Scenario: Hash format
    it("should produce a salted scrypt hash", async () => {
        const hash = await hasher.hash("test-password");

        expect(hash).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{64}$/);
        expect(hash).not.toContain("test-password");
    });

    // Scenario: Same password, different salts
    it("should salt every hash", async () => {
        const first = await hasher.hash("test-password");
        const second = await hasher.hash("test-password");

        expect(first).not.toBe(second);
    });

    it("should verify the right password only", async () => {
        const hash = await hasher.hash("test-password");

        expect(await hasher.verify("test-password", hash)).toBe(true);
        expect(await hasher.verify("wrong-password", hash)).toBe(false);
    });

    it("should reject a hash in another format", async () => {
        expect(await hasher.verify("test-password", "hashed:test-password")).toBe(false);
    });
});
