/**
 * Authentication Public API
 */

export type { AuthEndpoints, AuthState, CredentialPrompter, ResolvedAuth, SessionSource } from './types.js';
export { Authenticator } from './authenticator.js';
export type { AuthenticatorOptions } from './authenticator.js';
export { CredentialResolver, PROMPT_PASSWORD, PROMPT_USERNAME } from './credential-resolver.js';
export type { CredentialResolverOptions } from './credential-resolver.js';
export { SessionStore } from './session-store.js';
export type { SessionStoreOptions } from './session-store.js';
export { createTerminalPrompter, resolvePrompter } from './prompt.js';
