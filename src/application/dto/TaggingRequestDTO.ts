import { z } from 'zod';
import { isoDate } from './ParsedExportDTO.js';

const label = z.string().trim().min(1);

export const TagVendorsRequestSchema = z.object({
  vendors: z.array(z.string().min(1)).min(1),
  labels: z.array(label).min(1),
  exceptional: z.boolean().optional(),
});

export type TagVendorsRequestDTO = z.infer<typeof TagVendorsRequestSchema>;

export const TagTransactionRequestSchema = z.object({
  labels: z.array(label).min(1),
  exceptional: z.boolean().optional(),
});

export type TagTransactionRequestDTO = z.infer<typeof TagTransactionRequestSchema>;

export const ExceptionalRequestSchema = z.object({
  exceptional: z.boolean(),
});

export const ImportRequestSchema = z.object({
  fileName: z.string().min(1),
});

export const ReportQuerySchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
  currency: z.string().min(1).optional(),
});

export type ReportQueryDTO = z.infer<typeof ReportQuerySchema>;

const vendorList = z.union([z.string(), z.array(z.string())]).optional();

export const VendorQuerySchema = z.object({
  vendor: vendorList.transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value])),
});
