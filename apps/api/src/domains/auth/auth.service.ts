import {
  GatewayMessage,
  TOKEN_TYPE,
} from '@medgate/shared/constants/portal.constants.js';
import { type Login } from '@medgate/shared/schemas/auth.schema.js';
import { type PortalClient } from '../portal/portal.types.js';
import { withPortalSession } from '../portal/portal.client.js';
import { describePortalFailure } from '../portal/portal.errors.js';
import { type TokenService } from './token.service.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface LoginServiceDeps {
  portal: PortalClient;
  tokenService: TokenService;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface LoginResponse {
  success: boolean;
  message: string;
  access_token?: string;
  token_type: typeof TOKEN_TYPE;
}

export interface LoginOutcome {
  response: LoginResponse;
  /** Set when the portal refused or failed; for logging only. */
  error?: unknown;
}

// ---------------------------------------------------------------------------
// Service functions
// ---------------------------------------------------------------------------

/**
 * Verify the credentials with a live portal sign-in and, when the portal
 * accepts them, issue a bearer token that embeds them.
 *
 * Never rejects: any failure becomes `success: false` with the failure text
 * in the message.
 */
export async function login(
  deps: LoginServiceDeps,
  credentials: Login,
): Promise<LoginOutcome> {
  try {
    await withPortalSession(deps.portal, credentials, async () => undefined);
    const accessToken = await deps.tokenService.issue(
      credentials.identifier,
      credentials.secret,
    );

    return {
      response: {
        success: true,
        message: GatewayMessage.LOGIN_SUCCESS,
        access_token: accessToken,
        token_type: TOKEN_TYPE,
      },
    };
  } catch (err) {
    const reason = describePortalFailure(err, GatewayMessage.UNKNOWN_PORTAL_ERROR);
    return {
      response: {
        success: false,
        message: `${GatewayMessage.LOGIN_FAILURE_PREFIX}: ${reason}`,
        token_type: TOKEN_TYPE,
      },
      error: err,
    };
  }
}
