import { z } from 'zod';
import { QueryParseError } from '../errors';
import { FilterOperator } from './FilterOperator';
import { SortOrder } from './SortOrder';

/**
 * One `filters[i]` entry of the wire dictionary
 */
export const filterEntrySchema = z.object({
  fields: z
    .string({ required_error: 'fields is required' })
    .transform(value =>
      value
        .split(',')
        .map(field => field.trim())
        .filter(field => field.length > 0),
    )
    .refine(fields => fields.length > 0, 'fields must name at least one field'),
  op: z.string({ required_error: 'op is required' }).trim().toLowerCase().pipe(z.nativeEnum(FilterOperator)),
  val: z.string().optional(),
  case: z
    .string()
    .optional()
    .transform(value => value?.trim().toLowerCase() === 'true'),
});

/**
 * One `sortings[i]` entry of the wire dictionary
 */
export const sortingEntrySchema = z.object({
  prop: z.string({ required_error: 'prop is required' }).trim().min(1, 'prop must not be empty'),
  ord: z.string({ required_error: 'ord is required' }).trim().toLowerCase().pipe(z.nativeEnum(SortOrder)),
});

const integerString = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform(Number)
  .refine(value => Number.isSafeInteger(value), 'must be a safe integer');

/**
 * The `skip` and `take` entries of the wire dictionary
 */
export const pagingEntrySchema = z.object({
  skip: integerString,
  take: integerString,
});

/**
 * Validates a wire entry, raising QueryParseError with the issues as details
 */
export function parseEntry<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  entry: Readonly<Record<string, string | undefined>>,
  label: string,
): z.output<TSchema> {
  const result = schema.safeParse(entry);
  if (!result.success) {
    const summary = result.error.issues
      .map(issue => `${issue.path.join('.') || label}: ${issue.message}`)
      .join('; ');
    throw new QueryParseError(`Invalid ${label}: ${summary}`, result.error.issues);
  }
  return result.data;
}
