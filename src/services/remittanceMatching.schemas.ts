import { z, ZodError } from 'zod';
import { AppError } from '../utils';

export const paymentLineSchema = z.object({
  rawInvoiceText: z
    .string()
    .refine((value) => value.trim().length > 0, 'Invoice number is required'),
  paidAmount: z.number().finite('Paid amount must be finite').nonnegative('Paid amount cannot be negative'),
});

export const matchRemittanceSchema = z.object({
  organizationId: z.string().min(1, 'Organization ID is required'),
  payments: z.array(paymentLineSchema),
  extractionConfidence: z.number().min(0).max(1).optional(),
});

export type MatchRemittanceInput = z.infer<typeof matchRemittanceSchema>;

/**
 * Validates a matching request before any matching starts.
 * Invalid input is rejected as a whole; the engine never sees a partial batch.
 */
export const parseMatchRemittanceInput = (input: unknown): MatchRemittanceInput => {
  try {
    return matchRemittanceSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const errorMessages = error.errors.map((err) => ({
        field: err.path.join('.'),
        message: err.message,
      }));
      throw AppError.badRequest(`Validation failed: ${JSON.stringify(errorMessages)}`);
    }
    throw error;
  }
};
