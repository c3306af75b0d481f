import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { type TokenService } from '../domains/auth/token.service.js';
import { type PortalCredentials } from '../domains/portal/portal.types.js';
import { UnauthorizedError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Type augmentation: add portal credentials to Fastify request
// ---------------------------------------------------------------------------

declare module 'fastify' {
  interface FastifyRequest {
    portalCredentials: PortalCredentials;
  }
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

// ---------------------------------------------------------------------------
// Bearer token parsing
// ---------------------------------------------------------------------------

const BEARER_SCHEME = 'bearer';

function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, ...rest] = header.trim().split(/\s+/);
  if (scheme?.toLowerCase() !== BEARER_SCHEME || rest.length !== 1) {
    return null;
  }
  return rest[0] || null;
}

// ---------------------------------------------------------------------------
// Plugin: authenticate
// ---------------------------------------------------------------------------

export interface AuthPluginOptions {
  tokenService: TokenService;
}

async function authPlugin(app: FastifyInstance, opts: AuthPluginOptions) {
  const { tokenService } = opts;

  /**
   * authenticate: onRequest hook that decodes the bearer token and populates
   * request.portalCredentials. Token errors propagate to the error handler
   * as 401s.
   */
  app.decorate('authenticate', async function authenticate(
    request: FastifyRequest,
    _reply: FastifyReply,
  ) {
    const token = parseBearerToken(request.headers.authorization);
    if (!token) {
      throw new UnauthorizedError();
    }

    request.portalCredentials = await tokenService.decode(token);
  });
}

// ---------------------------------------------------------------------------
// Exports
// ---------------------------------------------------------------------------

export const authPluginFp = fp(authPlugin, {
  name: 'auth-plugin',
});

// Named exports for direct use in tests
export { authPlugin, parseBearerToken };
