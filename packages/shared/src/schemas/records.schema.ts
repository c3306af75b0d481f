// ============================================================================
// Hospital Portal Gateway: Medical Record Query Schemas
// ============================================================================

import { z } from 'zod';
import {
  InquiryType,
  CodeDivision,
  DEFAULT_CODE_DIVISION,
} from '../constants/portal.constants.js';
import { validateYmdDate } from '../utils/date.utils.js';

// --- Reusable fields ---

/** A JSON number, or a string of plain digits coerced to one. */
const integerInputSchema = z
  .union([z.number(), z.string().regex(/^\d+$/, 'Expected digits only')])
  .pipe(z.coerce.number().int());

/** Calendar date as YYYYMMDD. */
const ymdDateSchema = integerInputSchema.superRefine((value, ctx) => {
  const result = validateYmdDate(value);
  if (!result.valid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
  }
});

// Left optional here; the configured default facility is applied by the
// records service so it can differ per deployment.
const facilityCodeSchema = z.string().min(1).optional();

const CODE_DIVISIONS = [CodeDivision.OUTPATIENT, CodeDivision.INPATIENT] as const;

// --- Range ordering ---

function isOrderedRange(range: { start_date: number; end_date: number }): boolean {
  return range.start_date <= range.end_date;
}

const ORDERED_RANGE_ERROR = {
  message: 'start_date must not be after end_date',
  path: ['end_date'],
};

const dateRangeFields = z.object({
  start_date: ymdDateSchema,
  end_date: ymdDateSchema,
  facility_code: facilityCodeSchema,
});

// ============================================================================
// Date range queries (reservations, lab tests, medications)
// ============================================================================

export const dateRangeQuerySchema = dateRangeFields.refine(
  isOrderedRange,
  ORDERED_RANGE_ERROR,
);

export type DateRangeQuery = z.infer<typeof dateRangeQuerySchema>;

// ============================================================================
// Care history
// ============================================================================

export const outpatientHistoryQuerySchema = dateRangeFields
  .extend({
    inquiry_type: z
      .literal(InquiryType.OUTPATIENT)
      .default(InquiryType.OUTPATIENT),
  })
  .refine(isOrderedRange, ORDERED_RANGE_ERROR);

export type OutpatientHistoryQuery = z.infer<typeof outpatientHistoryQuerySchema>;

export const hospitalizationHistoryQuerySchema = dateRangeFields
  .extend({
    inquiry_type: z
      .literal(InquiryType.INPATIENT)
      .default(InquiryType.INPATIENT),
  })
  .refine(isOrderedRange, ORDERED_RANGE_ERROR);

export type HospitalizationHistoryQuery = z.infer<
  typeof hospitalizationHistoryQuerySchema
>;

// ============================================================================
// Payments
// ============================================================================

export const paymentListQuerySchema = dateRangeFields
  .extend({
    code_division: z.enum(CODE_DIVISIONS).default(DEFAULT_CODE_DIVISION),
  })
  .refine(isOrderedRange, ORDERED_RANGE_ERROR);

export type PaymentListQuery = z.infer<typeof paymentListQuerySchema>;

export const paymentDetailQuerySchema = z.object({
  payment_number: integerInputSchema.pipe(z.number().positive()),
  facility_code: facilityCodeSchema,
});

export type PaymentDetailQuery = z.infer<typeof paymentDetailQuerySchema>;
