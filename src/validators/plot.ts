import { z } from 'zod';
import { PLOT_FIELD_LIMITS } from '../models/Plot';

// VARCHAR(n) counts characters; String#length counts UTF-16 units, so astral characters count twice.
function characterCount(value: string): number {
  return Array.from(value).length;
}

function requiredText(field: keyof typeof PLOT_FIELD_LIMITS) {
  const max = PLOT_FIELD_LIMITS[field];
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .refine((value) => characterCount(value) <= max, `${field} must be at most ${max} characters`);
}

// Absent and null summaries are both stored as null.
export const plotCreateSchema = z.object({
  title: requiredText('title'),
  work: requiredText('work'),
  status: requiredText('status'),
  summary: z
    .string({ invalid_type_error: 'summary must be a string or null' })
    .nullable()
    .optional()
    .transform((value) => value ?? null),
});

const optionalFilter = z
  .string({ invalid_type_error: 'filter must be given at most once' })
  .optional()
  .transform((value) => (value ? value : undefined));

export const plotListQuerySchema = z.object({
  work: optionalFilter,
  status: optionalFilter,
  q: optionalFilter,
});

export const plotIdParamSchema = z.object({
  id: z
    .string()
    .regex(/^[+-]?\d+$/, 'id must be an integer')
    .transform((value) => Number(value)),
});

export type PlotCreateInput = z.infer<typeof plotCreateSchema>;
