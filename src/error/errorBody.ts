import { z } from 'zod';

/** Canonical error payload returned by the API on non-success statuses. */
export const errorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

/** Parsed `{ error: { code, message } }` body. */
export type ErrorBody = z.output<typeof errorBodySchema>;
