import { type FastifyInstance } from 'fastify';
import {
  dateRangeQuerySchema,
  outpatientHistoryQuerySchema,
  hospitalizationHistoryQuerySchema,
  paymentListQuerySchema,
  paymentDetailQuerySchema,
} from '@medgate/shared/schemas/records.schema.js';
import { createRecordsHandlers, type RecordsHandlerDeps } from './records.handlers.js';

// ---------------------------------------------------------------------------
// Medical Record Routes (bearer token required)
// ---------------------------------------------------------------------------

export async function recordsRoutes(app: FastifyInstance, opts: { deps: RecordsHandlerDeps }) {
  const handlers = createRecordsHandlers(opts.deps);

  app.get('/api/user/info', {
    onRequest: [app.authenticate],
    handler: handlers.userInfoHandler,
  });

  app.post('/api/reservations', {
    schema: { body: dateRangeQuerySchema },
    onRequest: [app.authenticate],
    handler: handlers.reservationsHandler,
  });

  app.post('/api/lab-tests', {
    schema: { body: dateRangeQuerySchema },
    onRequest: [app.authenticate],
    handler: handlers.labTestsHandler,
  });

  app.post('/api/medications', {
    schema: { body: dateRangeQuerySchema },
    onRequest: [app.authenticate],
    handler: handlers.medicationsHandler,
  });

  app.post('/api/outpatient-history', {
    schema: { body: outpatientHistoryQuerySchema },
    onRequest: [app.authenticate],
    handler: handlers.outpatientHistoryHandler,
  });

  app.post('/api/hospitalization-history', {
    schema: { body: hospitalizationHistoryQuerySchema },
    onRequest: [app.authenticate],
    handler: handlers.hospitalizationHistoryHandler,
  });

  app.post('/api/payments', {
    schema: { body: paymentListQuerySchema },
    onRequest: [app.authenticate],
    handler: handlers.paymentListHandler,
  });

  app.post('/api/payments/detail', {
    schema: { body: paymentDetailQuerySchema },
    onRequest: [app.authenticate],
    handler: handlers.paymentDetailHandler,
  });
}
