// ============================================================================
// Hospital Portal Gateway: Constants
// ============================================================================

// --- Facility ---

/** Anam branch. Used whenever a query omits facility_code. */
export const DEFAULT_FACILITY_CODE = 'AA';

// --- Care History Inquiry Division ---

export const InquiryType = {
  OUTPATIENT: 2,
  INPATIENT: 3,
} as const;

export type InquiryType = (typeof InquiryType)[keyof typeof InquiryType];

// --- Payment Code Division ---

export const CodeDivision = {
  OUTPATIENT: 'O',
  INPATIENT: 'I',
} as const;

export type CodeDivision = (typeof CodeDivision)[keyof typeof CodeDivision];

export const DEFAULT_CODE_DIVISION: CodeDivision = CodeDivision.OUTPATIENT;

// --- Token ---

export const TOKEN_TYPE = 'bearer';

export const TokenAlgorithm = {
  HS256: 'HS256',
  HS384: 'HS384',
  HS512: 'HS512',
} as const;

export type TokenAlgorithm =
  (typeof TokenAlgorithm)[keyof typeof TokenAlgorithm];

// --- User-facing messages ---

export const GatewayMessage = {
  LOGIN_SUCCESS: '로그인 성공',
  LOGIN_FAILURE_PREFIX: '로그인 실패',
  INVALID_TOKEN: '유효하지 않은 인증 토큰입니다.',
  MISSING_CLAIM: '인증 정보를 확인할 수 없습니다.',
  UNKNOWN_PORTAL_ERROR: '알 수 없는 오류가 발생했습니다.',
} as const;
