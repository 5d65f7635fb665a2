export type { CredentialDigest, CredentialHasherOptions } from './hasher';
export { CredentialHasher, DEFAULT_ROUNDS, hashPassword, isValid, MAX_ROUNDS } from './hasher';
