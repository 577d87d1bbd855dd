import { z } from 'zod';

/** SQL NULL and JSON null both read as an absent field. */
export function nullable<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

/** Absent, null or invalid all read as `undefined`; used where a default applies. */
export function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema
    .nullish()
    .catch(undefined)
    .transform((value): z.output<T> | undefined => value ?? undefined);
}

/** pg returns Date for timestamptz columns and ISO strings inside jsonb. */
export const timestamp = z.coerce.date();

export const jsonRecord = z.record(z.unknown());

/** Keeps the valid entries of an array and drops the rest. */
export function filteredArray<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .transform((values): z.output<T>[] => {
      const out: z.output<T>[] = [];
      for (const value of values) {
        const parsed = item.safeParse(value);
        if (parsed.success) out.push(parsed.data);
      }
      return out;
    });
}
