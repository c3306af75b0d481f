import { hash as argon2Hash, verify as argon2Verify } from '@node-rs/argon2';
import { type Env } from './env.js';

// ---------------------------------------------------------------------------
// Argon2id password hashing. No endpoint stores passwords today; this is the
// hashing the gateway would use if it ever did.
// ---------------------------------------------------------------------------

export interface PasswordHashOptions {
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export const DEFAULT_PASSWORD_HASH_OPTIONS: PasswordHashOptions = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

export function passwordHashOptionsFromEnv(
  env: Pick<Env, 'ARGON2_MEMORY' | 'ARGON2_ITERATIONS'>,
): PasswordHashOptions {
  return {
    memoryCost: env.ARGON2_MEMORY,
    timeCost: env.ARGON2_ITERATIONS,
    parallelism: DEFAULT_PASSWORD_HASH_OPTIONS.parallelism,
  };
}

export function hashPassword(
  plain: string,
  options: PasswordHashOptions = DEFAULT_PASSWORD_HASH_OPTIONS,
): Promise<string> {
  return argon2Hash(plain, options);
}

/** Resolves false for a wrong password; rejects only for a malformed hash. */
export function verifyPassword(hashed: string, plain: string): Promise<boolean> {
  return argon2Verify(hashed, plain);
}
