// ============================================================================
// Medical Records Domain: Unit Tests
// Tests: route registration, Zod validation, parameter translation,
// facility defaulting, bearer authentication, failure envelopes, session
// cleanup.
// ============================================================================

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { SignJWT } from 'jose';
import { type FastifyInstance } from 'fastify';
import { buildApp } from '../../server.js';
import { type GatewayConfig } from '../../lib/env.js';
import { createTokenService } from '../auth/token.service.js';
import { PortalAuthError, PortalRequestError } from '../portal/portal.errors.js';
import { getReservations } from './records.service.js';

// ---------------------------------------------------------------------------
// Test constants
// ---------------------------------------------------------------------------

const TEST_CONFIG: GatewayConfig = {
  appName: 'Medical Records Gateway',
  appVersion: '0.1.0',
  secretKey: 'test-secret',
  algorithm: 'HS256',
  accessTokenExpireMinutes: 60,
  defaultFacilityCode: 'AA',
  corsOrigin: '*',
  logLevel: 'info',
};

const tokenService = createTokenService({
  secretKey: TEST_CONFIG.secretKey,
  algorithm: TEST_CONFIG.algorithm,
  ttlMinutes: TEST_CONFIG.accessTokenExpireMinutes,
});

const RANGE = { start_date: 20240101, end_date: 20240131 };
const PORTAL_ROWS = [{ apDt: '20240115', dpNm: '내과' }];

// ---------------------------------------------------------------------------
// Portal test doubles
// ---------------------------------------------------------------------------

function makeSession() {
  return {
    getInfo: vi.fn().mockResolvedValue({ memId: 'u1', memName: '홍길동' }),
    getReservations: vi.fn().mockResolvedValue(PORTAL_ROWS),
    getHealthCheckResult: vi.fn().mockResolvedValue(PORTAL_ROWS),
    getMedicationPrescriptionHistory: vi.fn().mockResolvedValue(PORTAL_ROWS),
    getAmbulatoryCareHistory: vi.fn().mockResolvedValue(PORTAL_ROWS),
    getHospitalizationAndDischargeHistory: vi.fn().mockResolvedValue(PORTAL_ROWS),
    getPayedList: vi.fn().mockResolvedValue(PORTAL_ROWS),
    getPayedDetail: vi.fn().mockResolvedValue({ mdrpNo: 987654, amt: 12000 }),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

type MockSession = ReturnType<typeof makeSession>;

// ---------------------------------------------------------------------------
// Endpoint table: url, portal operation, expected portal params for RANGE
// ---------------------------------------------------------------------------

const DATE_RANGE_ENDPOINTS: Array<{
  url: string;
  operation: keyof MockSession;
  params: (facility: string) => Record<string, unknown>;
}> = [
  {
    url: '/api/reservations',
    operation: 'getReservations',
    params: (hpCd) => ({ hpCd, apstYmd: 20240101, apfnYmd: 20240131 }),
  },
  {
    url: '/api/lab-tests',
    operation: 'getHealthCheckResult',
    params: (hpCd) => ({ hpCd, strtYmd: 20240101, fnshYmd: 20240131 }),
  },
  {
    url: '/api/medications',
    operation: 'getMedicationPrescriptionHistory',
    params: (hpCd) => ({ hpCd, ordrYmd1: 20240101, ordrYmd2: 20240131 }),
  },
  {
    url: '/api/outpatient-history',
    operation: 'getAmbulatoryCareHistory',
    params: (hpCd) => ({
      hpCd,
      inqrStrtYmd: 20240101,
      inqrFnshYmd: 20240131,
      inqrDvsnCd: 2,
    }),
  },
  {
    url: '/api/hospitalization-history',
    operation: 'getHospitalizationAndDischargeHistory',
    params: (hpCd) => ({
      hpCd,
      inqrStrtYmd: 20240101,
      inqrFnshYmd: 20240131,
      inqrDvsnCd: 3,
    }),
  },
  {
    url: '/api/payments',
    operation: 'getPayedList',
    params: (hpCd) => ({ hpCd, strtYmd: 20240101, fnshYmd: 20240131, codvCd: 'O' }),
  },
];

// ---------------------------------------------------------------------------
// App builder
// ---------------------------------------------------------------------------

let app: FastifyInstance;
let session: MockSession;
let portal: { signIn: Mock };
let token: string;

beforeEach(async () => {
  session = makeSession();
  portal = { signIn: vi.fn().mockResolvedValue(session) };
  token = await tokenService.issue('u1', 'p1');
  app = await buildApp({ config: TEST_CONFIG, portal, tokenService, logger: false });
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

// ---------------------------------------------------------------------------
// Helpers: inject requests
// ---------------------------------------------------------------------------

function authedPost(url: string, body: unknown, bearer = token) {
  return app.inject({
    method: 'POST',
    url,
    headers: {
      authorization: `Bearer ${bearer}`,
      'content-type': 'application/json',
    },
    payload: JSON.stringify(body),
  });
}

function authedGet(url: string, bearer = token) {
  return app.inject({
    method: 'GET',
    url,
    headers: { authorization: `Bearer ${bearer}` },
  });
}

// ============================================================================
// Tests
// ============================================================================

describe('Medical Record Routes', () => {
  // -----------------------------------------------------------------------
  // GET /api/user/info
  // -----------------------------------------------------------------------

  describe('GET /api/user/info', () => {
    it('returns the portal profile for the token identity', async () => {
      const res = await authedGet('/api/user/info');

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        success: true,
        message: '',
        data: { memId: 'u1', memName: '홍길동' },
      });
      expect(portal.signIn).toHaveBeenCalledWith({ identifier: 'u1', secret: 'p1' });
      expect(session.getInfo).toHaveBeenCalledTimes(1);
      expect(session.close).toHaveBeenCalledTimes(1);
    });
  });

  // -----------------------------------------------------------------------
  // Date range endpoints
  // -----------------------------------------------------------------------

  describe.each(DATE_RANGE_ENDPOINTS)('POST $url', ({ url, operation, params }) => {
    it('translates the request to portal parameters and wraps the result', async () => {
      const res = await authedPost(url, RANGE);

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ success: true, message: '', data: PORTAL_ROWS });
      expect(session[operation]).toHaveBeenCalledWith(params('AA'));
      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('treats an omitted facility_code like the configured default', async () => {
      await authedPost(url, RANGE);
      await authedPost(url, { ...RANGE, facility_code: 'AA' });

      const calls = session[operation].mock.calls;
      expect(calls).toHaveLength(2);
      expect(calls[0]).toEqual(calls[1]);
    });

    it('passes an explicit facility_code through', async () => {
      await authedPost(url, { ...RANGE, facility_code: 'GR' });

      expect(session[operation]).toHaveBeenCalledWith(params('GR'));
    });

    it('coerces numeric date strings', async () => {
      await authedPost(url, { start_date: '20240101', end_date: '20240131' });

      expect(session[operation]).toHaveBeenCalledWith(params('AA'));
    });

    it.each([
      ['missing start_date', { end_date: 20240131 }],
      ['missing end_date', { start_date: 20240101 }],
      ['non-calendar date', { start_date: 20240230, end_date: 20240331 }],
      ['short date', { start_date: 2024011, end_date: 20240131 }],
      ['reversed range', { start_date: 20240131, end_date: 20240101 }],
      ['non-numeric date', { start_date: 'yesterday', end_date: 20240131 }],
      ['date wrapped in an array', { start_date: [20240101], end_date: 20240131 }],
      ['date string with padding', { start_date: 20240101, end_date: '  20240131 ' }],
      ['boolean date', { start_date: true, end_date: 20240131 }],
      ['empty date string', { start_date: '', end_date: 20240131 }],
    ])('rejects %s with 400 without contacting the portal', async (_label, body) => {
      const res = await authedPost(url, body);

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('VALIDATION_ERROR');
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('returns 401 without a bearer token', async () => {
      const res = await app.inject({
        method: 'POST',
        url,
        headers: { 'content-type': 'application/json' },
        payload: JSON.stringify(RANGE),
      });

      expect(res.statusCode).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(res.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: '유효하지 않은 인증 토큰입니다.' },
      });
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('checks the bearer token before validating the body', async () => {
      const res = await authedPost(url, {}, 'garbage');

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: '유효하지 않은 인증 토큰입니다.' },
      });
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('returns 401 rather than 400 for an invalid body without a token', async () => {
      const res = await app.inject({
        method: 'POST',
        url,
        headers: { 'content-type': 'application/json' },
        payload: JSON.stringify({ start_date: 1 }),
      });

      expect(res.statusCode).toBe(401);
      expect(res.json().error.code).toBe('UNAUTHORIZED');
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('returns a failure envelope when the portal call fails', async () => {
      session[operation].mockRejectedValueOnce(
        new PortalRequestError('Portal responded with HTTP 502', 502),
      );

      const res = await authedPost(url, RANGE);

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        success: false,
        message: 'Portal responded with HTTP 502',
      });
      expect(session.close).toHaveBeenCalledTimes(1);
    });
  });

  // -----------------------------------------------------------------------
  // Variant-specific fields
  // -----------------------------------------------------------------------

  describe('variant fields', () => {
    it('passes code_division I through to the payment list', async () => {
      await authedPost('/api/payments', { ...RANGE, code_division: 'I' });

      expect(session.getPayedList).toHaveBeenCalledWith({
        hpCd: 'AA',
        strtYmd: 20240101,
        fnshYmd: 20240131,
        codvCd: 'I',
      });
    });

    it('rejects an unknown code_division', async () => {
      const res = await authedPost('/api/payments', { ...RANGE, code_division: 'X' });

      expect(res.statusCode).toBe(400);
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('accepts the outpatient discriminator when sent explicitly', async () => {
      const res = await authedPost('/api/outpatient-history', { ...RANGE, inquiry_type: 2 });

      expect(res.statusCode).toBe(200);
      expect(session.getAmbulatoryCareHistory).toHaveBeenCalledWith({
        hpCd: 'AA',
        inqrStrtYmd: 20240101,
        inqrFnshYmd: 20240131,
        inqrDvsnCd: 2,
      });
    });

    it('rejects the inpatient discriminator on the outpatient endpoint', async () => {
      const res = await authedPost('/api/outpatient-history', { ...RANGE, inquiry_type: 3 });

      expect(res.statusCode).toBe(400);
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('rejects the outpatient discriminator on the hospitalization endpoint', async () => {
      const res = await authedPost('/api/hospitalization-history', {
        ...RANGE,
        inquiry_type: 2,
      });

      expect(res.statusCode).toBe(400);
    });
  });

  // -----------------------------------------------------------------------
  // POST /api/payments/detail
  // -----------------------------------------------------------------------

  describe('POST /api/payments/detail', () => {
    it('fetches one payment by number', async () => {
      const res = await authedPost('/api/payments/detail', { payment_number: 987654 });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        success: true,
        message: '',
        data: { mdrpNo: 987654, amt: 12000 },
      });
      expect(session.getPayedDetail).toHaveBeenCalledWith({ hpCd: 'AA', mdrpNo: 987654 });
    });

    it('coerces a numeric payment_number string', async () => {
      await authedPost('/api/payments/detail', { payment_number: '987654' });

      expect(session.getPayedDetail).toHaveBeenCalledWith({ hpCd: 'AA', mdrpNo: 987654 });
    });

    it('uses an explicit facility_code', async () => {
      await authedPost('/api/payments/detail', { payment_number: 987654, facility_code: 'AS' });

      expect(session.getPayedDetail).toHaveBeenCalledWith({ hpCd: 'AS', mdrpNo: 987654 });
    });

    it.each([
      ['missing payment_number', {}],
      ['zero payment_number', { payment_number: 0 }],
      ['fractional payment_number', { payment_number: 12.5 }],
      ['boolean payment_number', { payment_number: true }],
      ['signed payment_number string', { payment_number: '+5' }],
      ['payment_number in an array', { payment_number: [987654] }],
    ])('rejects %s with 400 without contacting the portal', async (_label, body) => {
      const res = await authedPost('/api/payments/detail', body);

      expect(res.statusCode).toBe(400);
      expect(portal.signIn).not.toHaveBeenCalled();
    });
  });

  // -----------------------------------------------------------------------
  // Bearer token failures
  // -----------------------------------------------------------------------

  describe('bearer token', () => {
    it('rejects an expired token with 401', async () => {
      const issuedLongAgo = createTokenService({
        secretKey: TEST_CONFIG.secretKey,
        algorithm: 'HS256',
        ttlMinutes: 60,
        clock: () => new Date(Date.now() - 2 * 60 * 60 * 1000),
      });
      const expired = await issuedLongAgo.issue('u1', 'p1');

      const res = await authedPost('/api/reservations', RANGE, expired);

      expect(res.statusCode).toBe(401);
      expect(res.json().error.message).toBe('유효하지 않은 인증 토큰입니다.');
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('rejects a token signed with another key with 401', async () => {
      const foreign = createTokenService({
        secretKey: 'another-test-secret',
        algorithm: 'HS256',
        ttlMinutes: 60,
      });
      const forged = await foreign.issue('u1', 'p1');

      const res = await authedGet('/api/user/info', forged);

      expect(res.statusCode).toBe(401);
      expect(portal.signIn).not.toHaveBeenCalled();
    });

    it('rejects a token without the secret claim with the claim message', async () => {
      const now = Math.floor(Date.now() / 1000);
      const partial = await new SignJWT({})
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('u1')
        .setIssuedAt(now)
        .setExpirationTime(now + 3600)
        .sign(new TextEncoder().encode(TEST_CONFIG.secretKey));

      const res = await authedGet('/api/user/info', partial);

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: '인증 정보를 확인할 수 없습니다.' },
      });
    });

    it('rejects a non-bearer authorization scheme with 401', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/user/info',
        headers: { authorization: 'Basic dTE6cDE=' },
      });

      expect(res.statusCode).toBe(401);
    });
  });

  // -----------------------------------------------------------------------
  // Portal failures
  // -----------------------------------------------------------------------

  describe('portal failures', () => {
    it('returns 200 with the failure text when portal sign-in fails', async () => {
      portal.signIn.mockRejectedValueOnce(
        new PortalAuthError('Portal rejected sign-in (HTTP 401)', 401),
      );

      const res = await authedPost('/api/reservations', RANGE);

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        success: false,
        message: 'Portal rejected sign-in (HTTP 401)',
      });
      expect(session.getReservations).not.toHaveBeenCalled();
    });

    it('returns a failure envelope for a non-Error rejection', async () => {
      session.getInfo.mockRejectedValueOnce('socket hang up');

      const res = await authedGet('/api/user/info');

      expect(res.json()).toEqual({ success: false, message: 'socket hang up' });
      expect(session.close).toHaveBeenCalledTimes(1);
    });
  });
});

describe('records service', () => {
  it('opens a separate portal session for every call', async () => {
    const first = makeSession();
    const second = makeSession();
    const signIn = vi.fn().mockResolvedValueOnce(first).mockResolvedValueOnce(second);
    const deps = { portal: { signIn }, defaultFacilityCode: 'AA' };
    const credentials = { identifier: 'u1', secret: 'p1' };

    await getReservations(deps, credentials, RANGE);
    await getReservations(deps, credentials, RANGE);

    expect(signIn).toHaveBeenCalledTimes(2);
    expect(first.close).toHaveBeenCalledTimes(1);
    expect(second.close).toHaveBeenCalledTimes(1);
  });

  it('keeps the failure cause beside the envelope', async () => {
    const error = new PortalRequestError('Portal unreachable: ECONNREFUSED');
    const deps = {
      portal: { signIn: vi.fn().mockRejectedValue(error) },
      defaultFacilityCode: 'AA',
    };

    const outcome = await getReservations(deps, { identifier: 'u1', secret: 'p1' }, RANGE);

    expect(outcome).toEqual({
      response: { success: false, message: 'Portal unreachable: ECONNREFUSED' },
      error,
    });
  });
});
