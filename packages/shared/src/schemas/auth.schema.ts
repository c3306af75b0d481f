// ============================================================================
// Hospital Portal Gateway: Auth Validation Schemas
// ============================================================================

import { z } from 'zod';

// --- Login ---

export const loginSchema = z.object({
  identifier: z.string().min(1, 'identifier is required'),
  secret: z.string().min(1, 'secret is required'),
});

export type Login = z.infer<typeof loginSchema>;
