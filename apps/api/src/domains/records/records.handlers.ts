import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type DateRangeQuery,
  type OutpatientHistoryQuery,
  type HospitalizationHistoryQuery,
  type PaymentListQuery,
  type PaymentDetailQuery,
} from '@medgate/shared/schemas/records.schema.js';
import {
  getUserInfo,
  getReservations,
  getLabTestResults,
  getMedicationHistory,
  getOutpatientHistory,
  getHospitalizationHistory,
  getPaymentList,
  getPaymentDetail,
  type QueryOutcome,
  type RecordsServiceDeps,
} from './records.service.js';

// ---------------------------------------------------------------------------
// Helper: log the failure kind, then send the envelope (always HTTP 200)
// ---------------------------------------------------------------------------

function sendOutcome(
  request: FastifyRequest,
  reply: FastifyReply,
  outcome: QueryOutcome,
) {
  if (!outcome.response.success) {
    request.log.warn({ err: outcome.error }, 'Portal query failed');
  }
  return reply.code(200).send(outcome.response);
}

// ---------------------------------------------------------------------------
// Handler factory: creates record handlers with injected dependencies
// ---------------------------------------------------------------------------

export interface RecordsHandlerDeps {
  serviceDeps: RecordsServiceDeps;
}

export function createRecordsHandlers(deps: RecordsHandlerDeps) {
  const { serviceDeps } = deps;

  // GET /api/user/info
  async function userInfoHandler(request: FastifyRequest, reply: FastifyReply) {
    const outcome = await getUserInfo(serviceDeps, request.portalCredentials);
    return sendOutcome(request, reply, outcome);
  }

  // POST /api/reservations
  async function reservationsHandler(
    request: FastifyRequest<{ Body: DateRangeQuery }>,
    reply: FastifyReply,
  ) {
    const outcome = await getReservations(
      serviceDeps,
      request.portalCredentials,
      request.body,
    );
    return sendOutcome(request, reply, outcome);
  }

  // POST /api/lab-tests
  async function labTestsHandler(
    request: FastifyRequest<{ Body: DateRangeQuery }>,
    reply: FastifyReply,
  ) {
    const outcome = await getLabTestResults(
      serviceDeps,
      request.portalCredentials,
      request.body,
    );
    return sendOutcome(request, reply, outcome);
  }

  // POST /api/medications
  async function medicationsHandler(
    request: FastifyRequest<{ Body: DateRangeQuery }>,
    reply: FastifyReply,
  ) {
    const outcome = await getMedicationHistory(
      serviceDeps,
      request.portalCredentials,
      request.body,
    );
    return sendOutcome(request, reply, outcome);
  }

  // POST /api/outpatient-history
  async function outpatientHistoryHandler(
    request: FastifyRequest<{ Body: OutpatientHistoryQuery }>,
    reply: FastifyReply,
  ) {
    const outcome = await getOutpatientHistory(
      serviceDeps,
      request.portalCredentials,
      request.body,
    );
    return sendOutcome(request, reply, outcome);
  }

  // POST /api/hospitalization-history
  async function hospitalizationHistoryHandler(
    request: FastifyRequest<{ Body: HospitalizationHistoryQuery }>,
    reply: FastifyReply,
  ) {
    const outcome = await getHospitalizationHistory(
      serviceDeps,
      request.portalCredentials,
      request.body,
    );
    return sendOutcome(request, reply, outcome);
  }

  // POST /api/payments
  async function paymentListHandler(
    request: FastifyRequest<{ Body: PaymentListQuery }>,
    reply: FastifyReply,
  ) {
    const outcome = await getPaymentList(
      serviceDeps,
      request.portalCredentials,
      request.body,
    );
    return sendOutcome(request, reply, outcome);
  }

  // POST /api/payments/detail
  async function paymentDetailHandler(
    request: FastifyRequest<{ Body: PaymentDetailQuery }>,
    reply: FastifyReply,
  ) {
    const outcome = await getPaymentDetail(
      serviceDeps,
      request.portalCredentials,
      request.body,
    );
    return sendOutcome(request, reply, outcome);
  }

  return {
    userInfoHandler,
    reservationsHandler,
    labTestsHandler,
    medicationsHandler,
    outpatientHistoryHandler,
    hospitalizationHistoryHandler,
    paymentListHandler,
    paymentDetailHandler,
  };
}
