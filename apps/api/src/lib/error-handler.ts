import { type FastifyError, type FastifyInstance, type FastifyReply } from 'fastify';
import { AppError, ValidationError } from './errors.js';

// ---------------------------------------------------------------------------
// Maps thrown errors to the `{ error: { code, message, details } }` shape.
// Portal failures never arrive here; the records service turns them into
// envelopes.
// ---------------------------------------------------------------------------

function sendAppError(reply: FastifyReply, error: AppError): FastifyReply {
  if (error.statusCode === 401) {
    reply.header('WWW-Authenticate', 'Bearer');
  }
  return reply.code(error.statusCode).send({
    error: {
      code: error.code,
      message: error.message,
      details: error.details,
    },
  });
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    if (error instanceof AppError) {
      return sendAppError(reply, error);
    }

    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return sendAppError(reply, new ValidationError('Validation failed', error.validation));
    }

    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({
        error: { code: error.code, message: error.message },
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
}
