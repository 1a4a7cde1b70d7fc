import { z } from 'zod';
import { ProviderError } from '../utils/errors.js';
import type { Cell } from '../utils/table.js';

/** Yahoo hands back dates as `Date`, epoch seconds, epoch milliseconds or ISO strings. */
export function toDate(value: Date | number | string): Date {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'number') {
    return new Date(value < 1e11 ? value * 1000 : value);
  }
  return new Date(value);
}

export const DateLikeSchema = z.union([z.date(), z.number(), z.string()]).transform(toDate);

const NumberCellSchema = z
  .number()
  .nullable()
  .optional()
  .transform(value => value ?? null);

export const RecordSchema = z.record(z.string(), z.unknown());
export const RecordListSchema = z.array(RecordSchema);

export const ChartQuoteSchema = z.object({
  date: DateLikeSchema,
  open: NumberCellSchema,
  high: NumberCellSchema,
  low: NumberCellSchema,
  close: NumberCellSchema,
  volume: NumberCellSchema,
});

const AmountEventSchema = z.object({
  date: DateLikeSchema,
  amount: z.number(),
});

const SplitEventSchema = z.object({
  date: DateLikeSchema,
  numerator: z.number(),
  denominator: z.number(),
});

// Validated results carry event arrays; raw ones are keyed by timestamp.
const AmountEventsSchema = z.union([
  z.array(AmountEventSchema),
  z.record(z.string(), AmountEventSchema).transform(events => Object.values(events)),
]);

const SplitEventsSchema = z.union([
  z.array(SplitEventSchema),
  z.record(z.string(), SplitEventSchema).transform(events => Object.values(events)),
]);

export const ChartSchema = z.object({
  quotes: z.array(ChartQuoteSchema).default([]),
  events: z
    .object({
      dividends: AmountEventsSchema.optional(),
      splits: SplitEventsSchema.optional(),
      capitalGains: AmountEventsSchema.optional(),
    })
    .optional(),
});

export type ChartQuote = z.infer<typeof ChartQuoteSchema>;
export type ChartResponse = z.infer<typeof ChartSchema>;

export const SearchSchema = z.object({
  quotes: RecordListSchema.default([]),
  news: RecordListSchema.default([]),
});

export const OptionsSchema = z.object({
  expirationDates: z.array(DateLikeSchema).default([]),
  options: z
    .array(
      z.object({
        calls: RecordListSchema.default([]),
        puts: RecordListSchema.default([]),
      })
    )
    .default([]),
});

export function parseResponse<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ProviderError(`Unexpected ${what} response${where}: ${issue?.message ?? 'invalid shape'}`);
  }
  return parsed.data;
}

/** Reads one quoteSummary module, `{}` when Yahoo left it out. */
export function summaryModule(summary: Record<string, unknown>, name: string): Record<string, unknown> {
  const parsed = RecordSchema.safeParse(summary[name]);
  return parsed.success ? parsed.data : {};
}

export function recordList(source: Record<string, unknown>, key: string): Array<Record<string, unknown>> {
  const parsed = RecordListSchema.safeParse(source[key]);
  return parsed.success ? parsed.data : [];
}

export function toCell(value: unknown): Cell {
  if (value === undefined || value === null) {
    return null;
  }
  if (value instanceof Date || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  // Unformatted quoteSummary values arrive as `{ raw, fmt }`.
  const formatted = z.object({ raw: z.number() }).safeParse(value);
  if (formatted.success) {
    return formatted.data.raw;
  }
  return JSON.stringify(value);
}

export function toCellRecord(record: Record<string, unknown>, omit: string[] = ['maxAge']): Record<string, Cell> {
  const cells: Record<string, Cell> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!omit.includes(key)) {
      cells[key] = toCell(value);
    }
  }
  return cells;
}

/** Renames source fields to column names, in the order given. */
export function pickCells(record: Record<string, unknown>, mapping: Array<[column: string, field: string]>): Record<string, Cell> {
  const cells: Record<string, Cell> = {};
  for (const [column, field] of mapping) {
    cells[column] = toCell(record[field]);
  }
  return cells;
}
