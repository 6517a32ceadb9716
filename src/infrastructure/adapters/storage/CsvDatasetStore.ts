import Papa from 'papaparse';
import { z } from 'zod';
import { DatasetStorePort } from '../../../application/ports/DatasetStorePort.js';
import { DECIMAL_AMOUNT, isoDate } from '../../../application/dto/ParsedExportDTO.js';
import { Dataset, TaggedTransaction, UNCATEGORIZED } from '../../../domain/entities/Transaction.js';
import { SchemaError } from '../../../domain/errors/PipelineErrors.js';
import { buildDatasetKey } from '../../../domain/services/TransactionHasher.js';
import { readTextFileIfExists, writeFileAtomic } from '../../fs/files.js';

export const DATASET_COLUMNS = ['date', 'description', 'amount', 'currency', 'category', 'exceptional', 'tags'] as const;
const REQUIRED_COLUMNS = DATASET_COLUMNS.filter((column) => column !== 'tags');
const TAG_SEPARATOR = '|';

const PersistedRowSchema = z.object({
  date: isoDate,
  description: z.string().trim().min(1),
  amount: z.string().trim().regex(DECIMAL_AMOUNT).transform(Number),
  currency: z.string().trim().min(1),
  category: z
    .string()
    .optional()
    .transform((value) => value?.trim() || UNCATEGORIZED),
  exceptional: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() === 'true'),
  tags: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(TAG_SEPARATOR)
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0),
    ),
});

const toRecord = (row: z.infer<typeof PersistedRowSchema>): TaggedTransaction => ({
  date: row.date,
  description: row.description,
  amount: row.amount,
  currency: row.currency,
  rawVendorText: row.description,
  key: buildDatasetKey(row),
  category: row.category,
  exceptional: row.exceptional,
  tags: row.tags,
});

/** Tagged dataset persisted as one comma-separated file. */
export class CsvDatasetStore implements DatasetStorePort {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Dataset> {
    const content = await readTextFileIfExists(this.filePath);

    if (content === null || content.trim() === '') {
      return [];
    }

    const result = Papa.parse<Record<string, string | undefined>>(content, {
      header: true,
      skipEmptyLines: 'greedy',
      transformHeader: (header) => header.trim(),
    });

    const fields = new Set(result.meta.fields ?? []);
    const missing = REQUIRED_COLUMNS.filter((column) => !fields.has(column));
    if (missing.length > 0) {
      throw new SchemaError(`Dataset ${this.filePath} is missing column(s): ${missing.join(', ')}`, missing);
    }

    const dataset: Dataset = [];
    const invalidRows: number[] = [];

    // Rows are never dropped on load: one invalid row fails the whole load.
    result.data.forEach((record, index) => {
      const parsed = PersistedRowSchema.safeParse(record);

      if (!parsed.success) {
        console.warn(`⚠️ Invalid dataset row ${index + 1}: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
        invalidRows.push(index + 1);
        return;
      }

      dataset.push(toRecord(parsed.data));
    });

    if (invalidRows.length > 0) {
      throw new SchemaError(`Dataset ${this.filePath} has invalid row(s): ${invalidRows.join(', ')}`, [], invalidRows);
    }

    return dataset;
  }

  async save(dataset: Dataset): Promise<void> {
    const csv = Papa.unparse(
      {
        fields: [...DATASET_COLUMNS],
        data: dataset.map((txn) => [
          txn.date,
          txn.description,
          txn.amount.toFixed(2),
          txn.currency,
          txn.category || UNCATEGORIZED,
          String(txn.exceptional),
          txn.tags.join(TAG_SEPARATOR),
        ]),
      },
      { newline: '\n' },
    );

    await writeFileAtomic(this.filePath, `${csv}\n`);
    console.log(`💾 Saved ${dataset.length} transaction(s) to ${this.filePath}`);
  }
}
