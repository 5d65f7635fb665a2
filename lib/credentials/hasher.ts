import { compareSync, genSaltSync, hashSync } from 'bcryptjs';
import { ConfigError, EncodingError } from '../core/errors';

/** bcrypt digest string, e.g. `$2a$12$<22-char salt><31-char hash>`. Salt and cost are embedded. */
export type CredentialDigest = string;

export const DEFAULT_ROUNDS = 12;

/**
 * Highest cost accepted for hashing and for stored digests. bcrypt allows 31,
 * but each step doubles the work and a foreign `$2a$31$` digest would stall
 * verification indefinitely.
 */
export const MAX_ROUNDS = 15;
const MIN_ROUNDS = 4;

/** bcrypt only reads the first 72 bytes of its input. */
const MAX_SECRET_BYTES = 72;

const DIGEST_PATTERN = /^\$2[abxy]?\$(\d{2})\$[./A-Za-z0-9]{53}$/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Returns why `secret` cannot be hashed as-is, or null when it can.
 */
function encodingProblem(secret: string): string | null {
  if (LONE_SURROGATE.test(secret)) {
    return 'secret contains an unpaired UTF-16 surrogate and has no UTF-8 form';
  }
  if (secret.includes('\u0000')) {
    return 'secret contains a NUL character, which bcrypt treats as end of input';
  }
  const bytes = Buffer.byteLength(secret, 'utf8');
  if (bytes > MAX_SECRET_BYTES) {
    return `secret is ${bytes} bytes in UTF-8; bcrypt ignores everything past ${MAX_SECRET_BYTES}`;
  }
  return null;
}

function assertRounds(rounds: number): void {
  if (!Number.isInteger(rounds) || rounds < MIN_ROUNDS || rounds > MAX_ROUNDS) {
    throw new ConfigError(`bcrypt rounds must be an integer between ${MIN_ROUNDS} and ${MAX_ROUNDS}, got ${rounds}`);
  }
}

/**
 * Hashes a password with a fresh random salt.
 *
 * @throws EncodingError if the secret cannot be fed to bcrypt without being altered
 * @throws ConfigError if `rounds` is out of range
 */
export function hashPassword(secret: string, rounds: number = DEFAULT_ROUNDS): CredentialDigest {
  assertRounds(rounds);
  const problem = encodingProblem(secret);
  if (problem !== null) {
    throw new EncodingError(problem);
  }
  return hashSync(secret, genSaltSync(rounds));
}

/**
 * Checks a password against a stored digest.
 *
 * Returns false for a wrong password, for anything that is not a bcrypt
 * digest, and for a digest whose cost exceeds {@link MAX_ROUNDS}; it does
 * not throw. The final comparison takes the same time
 * wherever the first differing character is.
 */
export function isValid(digest: CredentialDigest | Uint8Array, secret: string): boolean {
  const text = typeof digest === 'string' ? digest : Buffer.from(digest).toString('utf8');
  const shape = DIGEST_PATTERN.exec(text);
  if (shape === null || Number(shape[1]) > MAX_ROUNDS || encodingProblem(secret) !== null) {
    return false;
  }
  try {
    return compareSync(secret, text);
  } catch {
    // bcryptjs rejects some salts that pass the shape check (e.g. cost below 4).
    return false;
  }
}

export interface CredentialHasherOptions {
  /** bcrypt cost factor. Default: 12 */
  rounds?: number;
}

/**
 * Stateless hash/verify pair with a fixed cost factor.
 */
export class CredentialHasher {
  readonly rounds: number;

  constructor(options: CredentialHasherOptions = {}) {
    this.rounds = options.rounds ?? DEFAULT_ROUNDS;
    assertRounds(this.rounds);
  }

  hash(secret: string): CredentialDigest {
    return hashPassword(secret, this.rounds);
  }

  verify(digest: CredentialDigest | Uint8Array, secret: string): boolean {
    return isValid(digest, secret);
  }
}
