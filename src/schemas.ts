/**
 * Response schemas for the keys resource.
 */
import { z } from 'zod';
import { InvalidResponseError } from './exceptions';
import { Action } from './models';

const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .refine((date) => !Number.isNaN(date.getTime()), 'Invalid timestamp');

export const keyResponseSchema = z.object({
  actions: z
    .array(z.nativeEnum(Action))
    .nullish()
    .transform((actions) => actions ?? []),
  createdAt: timestampSchema,
  description: z.string().nullish(),
  name: z.string().nullish(),
  expiresAt: timestampSchema.nullish(),
  indexes: z
    .array(z.string())
    .nullish()
    .transform((indexes) => indexes ?? []),
  key: z.string().min(1),
  uid: z.string().nullish(),
  updatedAt: timestampSchema,
});

export type KeyResponse = z.infer<typeof keyResponseSchema>;

export const keysResultsResponseSchema = z.object({
  results: z.array(keyResponseSchema),
  limit: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
  total: z.number().int().nonnegative().optional(),
});

export const apiErrorBodySchema = z.object({
  message: z.string().optional(),
  code: z.string().optional(),
  type: z.string().optional(),
  link: z.string().optional(),
});

/**
 * Validate a decoded body, throwing {@link InvalidResponseError} on mismatch.
 */
export function decode<T extends z.ZodTypeAny>(schema: T, payload: unknown, what: string): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidResponseError(`Invalid ${what} in response: ${summary}`, result.error.issues);
  }
  return result.data;
}
