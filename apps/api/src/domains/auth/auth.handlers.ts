import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type Login } from '@medgate/shared/schemas/auth.schema.js';
import { login, type LoginServiceDeps } from './auth.service.js';

// ---------------------------------------------------------------------------
// Handler factory: creates auth handlers with injected dependencies
// ---------------------------------------------------------------------------

export interface AuthHandlerDeps {
  loginDeps: LoginServiceDeps;
}

export function createAuthHandlers(deps: AuthHandlerDeps) {
  // -------------------------------------------------------------------------
  // POST /api/auth/login
  // -------------------------------------------------------------------------

  async function loginHandler(
    request: FastifyRequest<{ Body: Login }>,
    reply: FastifyReply,
  ) {
    const outcome = await login(deps.loginDeps, request.body);
    if (!outcome.response.success) {
      // Rejected logins are a normal outcome: 200 with success=false
      request.log.info({ err: outcome.error }, 'Portal sign-in failed');
    }
    return reply.code(200).send(outcome.response);
  }

  return {
    loginHandler,
  };
}
