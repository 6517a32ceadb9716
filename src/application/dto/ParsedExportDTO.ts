import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { z } from 'zod';

dayjs.extend(customParseFormat);

/** Signed decimal such as `-4.50`. */
export const DECIMAL_AMOUNT = /^[+-]?\d+(\.\d+)?$/;

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => dayjs(value, 'YYYY-MM-DD', true).isValid(), 'Expected a calendar date');

export const ParsedTransactionSchema = z.object({
  date: isoDate,
  description: z.string().min(1),
  amount: z.number().finite(),
  currency: z.string().min(1),
  rawVendorText: z.string(),
});

export type ParsedTransactionDTO = z.infer<typeof ParsedTransactionSchema>;

export const SkippedRowSchema = z.object({
  row: z.number().int().positive(),
  reason: z.string(),
});

export type SkippedRowDTO = z.infer<typeof SkippedRowSchema>;

export const ParsedExportSchema = z.object({
  transactions: z.array(ParsedTransactionSchema),
  totalRows: z.number().int().nonnegative(),
  skipped: z.array(SkippedRowSchema),
  filtered: z.number().int().nonnegative(),
  columns: z.array(z.string()),
});

export type ParsedExportDTO = z.infer<typeof ParsedExportSchema>;
