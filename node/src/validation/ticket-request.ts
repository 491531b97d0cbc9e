import { z } from 'zod';
import type { ValidationIssue } from '@/utils/errors';
import { toValidationIssues } from '@/services/response-validator';
import { charLength } from '@/utils/text';

export const MIN_TICKET_LENGTH = 5;
export const MAX_TICKET_LENGTH = 5000;

export const ticketRequestSchema = z
  .object({
    ticket_text: z
      .string({ required_error: 'ticket_text is required' })
      .superRefine((text, ctx) => {
        const length = charLength(text);
        if (length < MIN_TICKET_LENGTH) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `ticket_text must be at least ${MIN_TICKET_LENGTH} characters`,
          });
        } else if (length > MAX_TICKET_LENGTH) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `ticket_text must be at most ${MAX_TICKET_LENGTH} characters`,
          });
        } else if (!text.trim()) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'ticket_text must not be blank' });
        }
      }),
  })
  .strict();

export type TicketRequestBody = z.infer<typeof ticketRequestSchema>;

/**
 * Validates a resolve-ticket request body
 * @param data - Request body to validate
 * @returns Validation result with typed data or path/message issues
 */
export function validateTicketRequest(data: unknown):
  | { success: true; data: TicketRequestBody }
  | { success: false; error: ValidationIssue[] } {
  const result = ticketRequestSchema.safeParse(data);

  if (!result.success) {
    return { success: false, error: toValidationIssues(result.error) };
  }

  return { success: true, data: result.data };
}
