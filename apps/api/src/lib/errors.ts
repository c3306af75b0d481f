import { GatewayMessage } from '@medgate/shared/constants/portal.constants.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = GatewayMessage.INVALID_TOKEN) {
    super(401, 'UNAUTHORIZED', message);
  }
}

export type InvalidTokenReason = 'signature' | 'expired' | 'malformed';

export class InvalidTokenError extends UnauthorizedError {
  constructor(public reason: InvalidTokenReason) {
    super(GatewayMessage.INVALID_TOKEN);
  }
}

export class MissingClaimError extends UnauthorizedError {
  constructor(public claim: string) {
    super(GatewayMessage.MISSING_CLAIM);
  }
}
