import { RawExportFile, RawExportSourcePort } from '../application/ports/RawExportSourcePort.js';
import { TaggedTransaction, UNCATEGORIZED } from '../domain/entities/Transaction.js';
import { StorageIOError } from '../domain/errors/PipelineErrors.js';
import { buildDatasetKey } from '../domain/services/TransactionHasher.js';

type Row = Pick<TaggedTransaction, 'date' | 'description' | 'amount'> & Partial<TaggedTransaction>;

export const tagged = (row: Row): TaggedTransaction => ({
  currency: 'EUR',
  rawVendorText: row.description,
  category: UNCATEGORIZED,
  exceptional: false,
  tags: [],
  ...row,
  key: row.key ?? buildDatasetKey(row),
});

export class FakeRawSource implements RawExportSourcePort {
  constructor(private readonly files: Record<string, string> = {}) {}

  async list(): Promise<RawExportFile[]> {
    return Object.entries(this.files).map(([fileName, content]) => ({
      fileName,
      size: content.length,
      modifiedAt: '2024-01-01T00:00:00.000Z',
      rows: content.trim().split('\n').length - 1,
      columns: content.split('\n')[0].split(','),
      readable: true,
    }));
  }

  async read(fileName: string): Promise<string> {
    if (!Object.hasOwn(this.files, fileName)) {
      throw new StorageIOError(`File not found: ${fileName}`, fileName, true);
    }

    return this.files[fileName];
  }
}
