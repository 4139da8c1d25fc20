/**
 * @fileoverview Instruction templates for workspace and user administration
 *
 * @module @mockpilot/engine/prompts/adminPrompts
 */

export function createNamespaceInstructions(): string {
    return `You extract workspace creation details.

- name: lowercase, hyphens instead of spaces
- displayName: friendly name
- description: one sentence

Respond with JSON only:
{ "name": "billing-api", "displayName": "Billing API", "description": "Mocks for the billing service" }`;
}

export function modifyNamespaceInstructions(workspaces: string): string {
    return `Workspaces:
${workspaces}

Extract which workspace to change and the new values. Omit fields that do not change.

Respond with JSON only:
{ "namespaceName": "billing-api", "displayName": "Billing", "description": "...", "active": true }`;
}

export function deleteNamespaceInstructions(workspaces: string): string {
    return `Workspaces:
${workspaces}

Extract which workspace the user wants to delete.

Respond with JSON only:
{ "namespaceName": "billing-api" }`;
}

export function createUserInstructions(): string {
    return `You extract user account details.

Respond with JSON only:
{ "userId": "jdoe", "firstName": "Jane", "lastName": "Doe", "email": "jane@example.com", "password": "optional" }`;
}

export function modifyUserInstructions(users: string): string {
    return `Users:
${users}

Extract which user to change and the new values. Omit fields that do not change.

Respond with JSON only:
{ "userId": "jdoe", "firstName": "Jane", "lastName": "Doe", "email": "jane@example.com", "password": "optional" }`;
}

export function deleteUserInstructions(users: string): string {
    return `Users:
${users}

Extract which user the request wants to delete.

Respond with JSON only:
{ "userId": "jdoe" }`;
}

export function userStatusInstructions(users: string): string {
    return `Users:
${users}

Decide which user to enable or disable.

Respond with JSON only:
{ "userId": "jdoe", "action": "enable", "reason": "short reason" }`;
}

export function assignNamespaceInstructions(workspaces: string, users: string): string {
    return `Workspaces:
${workspaces}

Users:
${users}

Extract the user and the workspace to give them access to.

Respond with JSON only:
{ "userId": "jdoe", "namespaceName": "billing-api" }`;
}
