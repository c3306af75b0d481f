// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

export interface PortalCredentials {
  identifier: string;
  secret: string;
}

// ---------------------------------------------------------------------------
// Query parameters, named as the portal expects them
// ---------------------------------------------------------------------------

export interface ReservationParams {
  hpCd: string;
  apstYmd: number;
  apfnYmd: number;
}

export interface HealthCheckResultParams {
  hpCd: string;
  strtYmd: number;
  fnshYmd: number;
}

export interface MedicationHistoryParams {
  hpCd: string;
  ordrYmd1: number;
  ordrYmd2: number;
}

export interface CareHistoryParams {
  hpCd: string;
  inqrStrtYmd: number;
  inqrFnshYmd: number;
  inqrDvsnCd: number;
}

export interface PayedListParams {
  hpCd: string;
  strtYmd: number;
  fnshYmd: number;
  codvCd: string;
}

export interface PayedDetailParams {
  hpCd: string;
  mdrpNo: number;
}

// ---------------------------------------------------------------------------
// Client contract
// ---------------------------------------------------------------------------

/**
 * An authenticated portal session. Payloads are returned as the portal sends
 * them; their shape belongs to the portal.
 */
export interface PortalSession {
  getInfo(): Promise<unknown>;
  getReservations(params: ReservationParams): Promise<unknown>;
  getHealthCheckResult(params: HealthCheckResultParams): Promise<unknown>;
  getMedicationPrescriptionHistory(params: MedicationHistoryParams): Promise<unknown>;
  getAmbulatoryCareHistory(params: CareHistoryParams): Promise<unknown>;
  getHospitalizationAndDischargeHistory(params: CareHistoryParams): Promise<unknown>;
  getPayedList(params: PayedListParams): Promise<unknown>;
  getPayedDetail(params: PayedDetailParams): Promise<unknown>;
  /** Releases the session. Must not throw. */
  close(): Promise<void>;
}

export interface PortalClient {
  /** Signs in with the given credentials; rejects when the portal refuses them. */
  signIn(credentials: PortalCredentials): Promise<PortalSession>;
}
