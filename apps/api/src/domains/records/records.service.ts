import { GatewayMessage } from '@medgate/shared/constants/portal.constants.js';
import {
  type DateRangeQuery,
  type OutpatientHistoryQuery,
  type HospitalizationHistoryQuery,
  type PaymentListQuery,
  type PaymentDetailQuery,
} from '@medgate/shared/schemas/records.schema.js';
import {
  type PortalClient,
  type PortalCredentials,
  type PortalSession,
} from '../portal/portal.types.js';
import { withPortalSession } from '../portal/portal.client.js';
import { describePortalFailure } from '../portal/portal.errors.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface RecordsServiceDeps {
  portal: PortalClient;
  defaultFacilityCode: string;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** Envelope returned by every record endpoint. `data` is absent on failure. */
export interface ApiResponse {
  success: boolean;
  message: string;
  data?: unknown;
}

export interface QueryOutcome {
  response: ApiResponse;
  /** Set when the portal interaction failed; for logging only. */
  error?: unknown;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Run one portal operation inside a fresh session and wrap the result.
 * Sign-in, transport and payload failures all collapse into a failure
 * envelope carrying the failure text.
 */
async function runQuery(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  operation: (session: PortalSession) => Promise<unknown>,
): Promise<QueryOutcome> {
  try {
    const data = await withPortalSession(deps.portal, credentials, operation);
    return { response: { success: true, message: '', data } };
  } catch (err) {
    return {
      response: {
        success: false,
        message: describePortalFailure(err, GatewayMessage.UNKNOWN_PORTAL_ERROR),
      },
      error: err,
    };
  }
}

function facilityOf(
  deps: RecordsServiceDeps,
  query: { facility_code?: string },
): string {
  return query.facility_code ?? deps.defaultFacilityCode;
}

// ---------------------------------------------------------------------------
// Service functions
// ---------------------------------------------------------------------------

export function getUserInfo(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) => session.getInfo());
}

export function getReservations(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  query: DateRangeQuery,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) =>
    session.getReservations({
      hpCd: facilityOf(deps, query),
      apstYmd: query.start_date,
      apfnYmd: query.end_date,
    }),
  );
}

export function getLabTestResults(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  query: DateRangeQuery,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) =>
    session.getHealthCheckResult({
      hpCd: facilityOf(deps, query),
      strtYmd: query.start_date,
      fnshYmd: query.end_date,
    }),
  );
}

export function getMedicationHistory(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  query: DateRangeQuery,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) =>
    session.getMedicationPrescriptionHistory({
      hpCd: facilityOf(deps, query),
      ordrYmd1: query.start_date,
      ordrYmd2: query.end_date,
    }),
  );
}

export function getOutpatientHistory(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  query: OutpatientHistoryQuery,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) =>
    session.getAmbulatoryCareHistory({
      hpCd: facilityOf(deps, query),
      inqrStrtYmd: query.start_date,
      inqrFnshYmd: query.end_date,
      inqrDvsnCd: query.inquiry_type,
    }),
  );
}

export function getHospitalizationHistory(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  query: HospitalizationHistoryQuery,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) =>
    session.getHospitalizationAndDischargeHistory({
      hpCd: facilityOf(deps, query),
      inqrStrtYmd: query.start_date,
      inqrFnshYmd: query.end_date,
      inqrDvsnCd: query.inquiry_type,
    }),
  );
}

export function getPaymentList(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  query: PaymentListQuery,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) =>
    session.getPayedList({
      hpCd: facilityOf(deps, query),
      strtYmd: query.start_date,
      fnshYmd: query.end_date,
      codvCd: query.code_division,
    }),
  );
}

export function getPaymentDetail(
  deps: RecordsServiceDeps,
  credentials: PortalCredentials,
  query: PaymentDetailQuery,
): Promise<QueryOutcome> {
  return runQuery(deps, credentials, (session) =>
    session.getPayedDetail({
      hpCd: facilityOf(deps, query),
      mdrpNo: query.payment_number,
    }),
  );
}
