/**
 * @fileoverview Password hashing collaborator
 *
 * The engine never stores plain-text passwords; it hands them to this
 * collaborator and keeps only the result.
 *
 * @module @mockpilot/engine/contracts/PasswordHasher
 */

export interface PasswordHasher {
    hash(password: string): Promise<string>;
}
