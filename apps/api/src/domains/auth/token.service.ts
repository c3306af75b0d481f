import { SignJWT, jwtVerify, errors, type JWTPayload } from 'jose';
import { type TokenAlgorithm } from '@medgate/shared/constants/portal.constants.js';
import {
  InvalidTokenError,
  MissingClaimError,
  type InvalidTokenReason,
} from '../../lib/errors.js';
import { type PortalCredentials } from '../portal/portal.types.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface TokenServiceDeps {
  secretKey: string;
  algorithm: TokenAlgorithm;
  ttlMinutes: number;
  /** Defaults to the wall clock. */
  clock?: () => Date;
}

export interface TokenService {
  issue(identifier: string, secret: string): Promise<string>;
  decode(token: string): Promise<PortalCredentials>;
}

// ---------------------------------------------------------------------------
// Claim names
// ---------------------------------------------------------------------------

const IDENTIFIER_CLAIM = 'sub';
const SECRET_CLAIM = 'pwd';

interface CredentialClaims extends JWTPayload {
  pwd?: unknown;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function classifyVerificationError(err: unknown): InvalidTokenReason {
  if (err instanceof errors.JWTExpired) return 'expired';
  if (err instanceof errors.JWSSignatureVerificationFailed) return 'signature';
  return 'malformed';
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Creates the token service that packages portal credentials into a signed,
 * time-limited JWT and unpacks them again.
 *
 * The secret travels inside the payload. Tokens are signed, not encrypted,
 * and cannot be revoked before `exp`.
 */
export function createTokenService(deps: TokenServiceDeps): TokenService {
  const key = new TextEncoder().encode(deps.secretKey);
  const clock = deps.clock ?? (() => new Date());
  const ttlSeconds = deps.ttlMinutes * 60;

  async function issue(identifier: string, secret: string): Promise<string> {
    const issuedAt = toEpochSeconds(clock());

    return new SignJWT({ [SECRET_CLAIM]: secret })
      .setProtectedHeader({ alg: deps.algorithm, typ: 'JWT' })
      .setSubject(identifier)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + ttlSeconds)
      .sign(key);
  }

  async function decode(token: string): Promise<PortalCredentials> {
    let payload: CredentialClaims;
    try {
      const result = await jwtVerify<CredentialClaims>(token, key, {
        algorithms: [deps.algorithm],
        currentDate: clock(),
        requiredClaims: ['exp'],
      });
      payload = result.payload;
    } catch (err) {
      throw new InvalidTokenError(classifyVerificationError(err));
    }

    const identifier = payload.sub;
    if (typeof identifier !== 'string') {
      throw new MissingClaimError(IDENTIFIER_CLAIM);
    }

    const secret = payload[SECRET_CLAIM];
    if (typeof secret !== 'string') {
      throw new MissingClaimError(SECRET_CLAIM);
    }

    return { identifier, secret };
  }

  return { issue, decode };
}
