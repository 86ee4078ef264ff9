import { z } from 'zod';
import { REASONING_MODES } from '../types/core';
import type { ReasoningMode } from '../types/core';

/**
 * Run request body (multipart fields or JSON). Files travel separately through multer.
 */
export const runRequestSchema = z.object({
  question: z
    .string({ required_error: 'Question is required' })
    .trim()
    .min(1, 'Question is required and cannot be empty'),
  mode: z
    .string()
    .trim()
    .toLowerCase()
    .refine((m): m is ReasoningMode => (REASONING_MODES as readonly string[]).includes(m), {
      message: `Mode must be one of: ${REASONING_MODES.join(', ')}`,
    })
    .optional()
    .default('research'),
});

export type RunRequestBody = { question: string; mode: ReasoningMode };

export function validateRunRequest(data: unknown): {
  success: true;
  data: RunRequestBody;
} | {
  success: false;
  error: Array<{ path: string; message: string }>;
} {
  const result = runRequestSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}
