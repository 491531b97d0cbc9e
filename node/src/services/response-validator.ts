import { z } from 'zod';
import { ACTION_LABELS, type TicketResponse } from '@/types/core';
import { ValidationError, type ValidationIssue } from '@/utils/errors';
import { charLength } from '@/utils/text';

export const MAX_ANSWER_LENGTH = 5000;
export const MAX_REFERENCES = 3;

const referencesSchema = z
  .array(z.string())
  .transform((refs) => refs.map((r) => r.trim()).filter((r) => r.length > 0))
  .refine((refs) => refs.length <= MAX_REFERENCES, {
    message: `at most ${MAX_REFERENCES} references allowed`,
  });

/** External response contract. Unknown keys and the internal `no_action` sentinel are rejected. */
export const ticketResponseSchema = z
  .object({
    answer: z
      .string()
      .trim()
      .superRefine((answer, ctx) => {
        if (!answer) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'answer must be non-empty' });
        } else if (charLength(answer) > MAX_ANSWER_LENGTH) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `answer must be at most ${MAX_ANSWER_LENGTH} characters`,
          });
        }
      }),
    references: referencesSchema.default([]),
    action_required: z.enum(ACTION_LABELS).default('none'),
  })
  .strict();

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join('.') || 'root',
    message: e.message,
  }));
}

export function validateResponse(candidate: unknown): TicketResponse {
  const result = ticketResponseSchema.safeParse(candidate);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ValidationError(
      `Response schema validation failed: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      issues,
    );
  }
  return result.data;
}
