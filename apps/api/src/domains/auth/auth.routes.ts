import { type FastifyInstance } from 'fastify';
import { loginSchema } from '@medgate/shared/schemas/auth.schema.js';
import { createAuthHandlers, type AuthHandlerDeps } from './auth.handlers.js';

// ---------------------------------------------------------------------------
// Auth Routes
// ---------------------------------------------------------------------------

export async function authRoutes(app: FastifyInstance, opts: { deps: AuthHandlerDeps }) {
  const handlers = createAuthHandlers(opts.deps);

  // Public: credentials are checked against the portal, not a local store
  app.post('/api/auth/login', {
    schema: { body: loginSchema },
    handler: handlers.loginHandler,
  });
}
