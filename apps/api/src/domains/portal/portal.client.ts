import {
  type CareHistoryParams,
  type HealthCheckResultParams,
  type MedicationHistoryParams,
  type PayedDetailParams,
  type PayedListParams,
  type PortalClient,
  type PortalCredentials,
  type PortalSession,
  type ReservationParams,
} from './portal.types.js';
import {
  PortalAuthError,
  PortalRequestError,
  PortalResponseError,
} from './portal.errors.js';

// ---------------------------------------------------------------------------
// Portal endpoints (relative to the configured base URL)
// ---------------------------------------------------------------------------

export const PortalEndpoint = {
  SIGN_IN: '/api/member/login',
  INFO: '/api/member/info',
  RESERVATIONS: '/api/reservation/list',
  HEALTH_CHECK_RESULT: '/api/exam/result/list',
  MEDICATION_HISTORY: '/api/prescription/list',
  AMBULATORY_CARE_HISTORY: '/api/care/outpatient/list',
  HOSPITALIZATION_HISTORY: '/api/care/inpatient/list',
  PAYED_LIST: '/api/payment/list',
  PAYED_DETAIL: '/api/payment/detail',
} as const;

type PortalPath = (typeof PortalEndpoint)[keyof typeof PortalEndpoint];

export interface HttpPortalClientOptions {
  baseUrl: string;
  /** Defaults to the global fetch. */
  fetch?: typeof fetch;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Session: one cookie jar per sign-in, never shared between requests
// ---------------------------------------------------------------------------

class HttpPortalSession implements PortalSession {
  private readonly cookies = new Map<string, string>();
  private readonly controller = new AbortController();

  constructor(
    private readonly baseUrl: string,
    private readonly fetchFn: typeof fetch,
  ) {}

  async signIn(credentials: PortalCredentials): Promise<void> {
    const response = await this.send(PortalEndpoint.SIGN_IN, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        username: credentials.identifier,
        password: credentials.secret,
      }).toString(),
    });

    if (!response.ok) {
      throw new PortalAuthError(
        `Portal rejected sign-in (HTTP ${response.status})`,
        response.status,
      );
    }
    if (this.cookies.size === 0) {
      throw new PortalAuthError('Portal did not open a session');
    }
  }

  getInfo(): Promise<unknown> {
    return this.query('GET', PortalEndpoint.INFO);
  }

  getReservations(params: ReservationParams): Promise<unknown> {
    return this.query('POST', PortalEndpoint.RESERVATIONS, params);
  }

  getHealthCheckResult(params: HealthCheckResultParams): Promise<unknown> {
    return this.query('POST', PortalEndpoint.HEALTH_CHECK_RESULT, params);
  }

  getMedicationPrescriptionHistory(params: MedicationHistoryParams): Promise<unknown> {
    return this.query('POST', PortalEndpoint.MEDICATION_HISTORY, params);
  }

  getAmbulatoryCareHistory(params: CareHistoryParams): Promise<unknown> {
    return this.query('POST', PortalEndpoint.AMBULATORY_CARE_HISTORY, params);
  }

  getHospitalizationAndDischargeHistory(params: CareHistoryParams): Promise<unknown> {
    return this.query('POST', PortalEndpoint.HOSPITALIZATION_HISTORY, params);
  }

  getPayedList(params: PayedListParams): Promise<unknown> {
    return this.query('POST', PortalEndpoint.PAYED_LIST, params);
  }

  getPayedDetail(params: PayedDetailParams): Promise<unknown> {
    return this.query('POST', PortalEndpoint.PAYED_DETAIL, params);
  }

  async close(): Promise<void> {
    this.controller.abort();
    this.cookies.clear();
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  private async query(
    method: 'GET' | 'POST',
    path: PortalPath,
    params?: object,
  ): Promise<unknown> {
    const response = await this.send(path, {
      method,
      headers: params ? { 'content-type': 'application/json' } : {},
      body: params ? JSON.stringify(params) : undefined,
    });

    if (response.status === 401 || response.status === 403) {
      throw new PortalAuthError(
        `Portal session was rejected (HTTP ${response.status})`,
        response.status,
      );
    }
    if (!response.ok) {
      throw new PortalRequestError(
        `Portal responded with HTTP ${response.status}`,
        response.status,
      );
    }

    const text = await response.text();
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      throw new PortalResponseError('Portal returned a non-JSON body', response.status);
    }
  }

  private async send(
    path: PortalPath,
    init: { method: string; headers: Record<string, string>; body?: string },
  ): Promise<Response> {
    const headers: Record<string, string> = { accept: 'application/json', ...init.headers };
    if (this.cookies.size > 0) {
      headers.cookie = [...this.cookies]
        .map(([name, value]) => `${name}=${value}`)
        .join('; ');
    }

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method: init.method,
        headers,
        body: init.body,
        signal: this.controller.signal,
      });
    } catch (err) {
      throw new PortalRequestError(`Portal unreachable: ${describeError(err)}`);
    }

    this.storeCookies(response);
    return response;
  }

  private storeCookies(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(';', 1)[0] ?? '';
      const separator = pair.indexOf('=');
      if (separator <= 0) continue;
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/**
 * Portal adapter over fetch. Each sign-in gets its own session and cookie
 * jar; credentials are passed per call and never read from the environment.
 */
export class HttpPortalClient implements PortalClient {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpPortalClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  async signIn(credentials: PortalCredentials): Promise<PortalSession> {
    const session = new HttpPortalSession(this.baseUrl, this.fetchFn);
    try {
      await session.signIn(credentials);
    } catch (err) {
      await session.close();
      throw err;
    }
    return session;
  }
}

// ---------------------------------------------------------------------------
// Scoped session
// ---------------------------------------------------------------------------

/**
 * Signs in, runs `fn` with the session, and closes the session on every exit
 * path.
 */
export async function withPortalSession<T>(
  client: PortalClient,
  credentials: PortalCredentials,
  fn: (session: PortalSession) => Promise<T>,
): Promise<T> {
  const session = await client.signIn(credentials);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
