import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ExportParseOptions } from '../../application/ports/ExportParserPort.js';
import { ImportService } from '../../application/services/ImportService.js';
import { TaggingConfigSession } from '../../application/services/TaggingConfigSession.js';
import { SchemaError, StorageIOError } from '../../domain/errors/PipelineErrors.js';
import { InMemoryTaggingConfigStore } from '../../infrastructure/adapters/config/InMemoryTaggingConfigStore.js';
import { CsvExportParser } from '../../infrastructure/adapters/parser/CsvExportParser.js';
import { InMemoryDatasetStore } from '../../infrastructure/adapters/storage/InMemoryDatasetStore.js';
import { FakeRawSource } from '../fixtures.js';

const january = [
  'Type,Started Date,Description,Amount,Currency',
  'CARD_PAYMENT,2024-01-05 09:12:00,Coffee Shop,-4.50,EUR',
  'CARD_PAYMENT,2024-01-06 18:30:00,XYZ123,-12.00,EUR',
  '',
].join('\n');

const options: ExportParseOptions = {
  columns: { date: 'Started Date', description: 'Description', amount: 'Amount', currency: 'Currency' },
};

describe('ImportService', () => {
  let datasetStore: InMemoryDatasetStore;
  let configStore: InMemoryTaggingConfigStore;
  let service: ImportService;

  const build = (parseOptions: ExportParseOptions = options): ImportService =>
    new ImportService(
      new CsvExportParser(),
      datasetStore,
      new FakeRawSource({ 'jan.csv': january }),
      new TaggingConfigSession(configStore),
      parseOptions,
    );

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    datasetStore = new InMemoryDatasetStore();
    configStore = new InMemoryTaggingConfigStore({
      tags: { Food: 1 },
      vendorTags: { 'coffee shop': { Food: 1 } },
      mainCategories: [],
    });
    service = build();
  });

  it('tags known vendors and lists the rest for review', async () => {
    const result = await service.importExport({ fileName: 'jan.csv' });

    expect(result.added).toBe(2);
    expect(result.preserved).toBe(0);
    expect(result.pendingVendors).toEqual([
      { vendor: 'XYZ123', vendorKey: 'xyz123', total: -12, count: 1, known: false },
    ]);
    expect(result.summary).toEqual({
      totalAmount: -16.5,
      largestExpense: 12,
      smallestExpense: 4.5,
      knownVendors: 1,
      unknownVendors: 1,
    });

    const dataset = await datasetStore.load();
    expect(dataset.map((txn) => [txn.date, txn.description, txn.category])).toEqual([
      ['2024-01-05', 'Coffee Shop', 'Food'],
      ['2024-01-06', 'XYZ123', 'uncategorized'],
    ]);
  });

  it('changes nothing when the same export is imported again', async () => {
    await service.importExport({ fileName: 'jan.csv' });
    const before = await datasetStore.load();

    const again = await service.importExport({ fileName: 'jan.csv' });

    expect(again.added).toBe(0);
    expect(again.preserved).toBe(2);
    expect(datasetStore.saves).toBe(1);
    expect(await datasetStore.load()).toEqual(before);
  });

  it('keeps manual tags when a row is imported again', async () => {
    await service.importExport({ fileName: 'jan.csv' });
    const dataset = await datasetStore.load();
    await datasetStore.save(
      dataset.map((txn) => (txn.description === 'XYZ123' ? { ...txn, category: 'Fun', tags: ['Games'] } : txn)),
    );

    await service.importExport({ fileName: 'jan.csv' });

    const row = (await datasetStore.load()).find((txn) => txn.description === 'XYZ123');
    expect(row).toMatchObject({ category: 'Fun', tags: ['Games'] });
  });

  it('loads the vendor table once per session', async () => {
    await service.importExport({ fileName: 'jan.csv' });
    await service.importExport({ fileName: 'jan.csv' });

    expect(configStore.loads).toBe(1);
  });

  it('imports uploaded content without touching the raw directory', async () => {
    const upload = 'Started Date,Description,Amount,Currency\n2024-02-01,Grocer,-30,EUR\n';

    const result = await service.importExport({ fileName: 'upload.csv', content: upload });

    expect(result).toMatchObject({ fileName: 'upload.csv', totalRows: 1, parsed: 1, added: 1 });
    expect((await datasetStore.load()).map((txn) => txn.description)).toEqual(['Grocer']);
  });

  it('aborts without saving when a required column is missing', async () => {
    const upload = 'Date,Text,Amount\n2024-02-01,Grocer,-30\n';

    await expect(service.importExport({ fileName: 'bad.csv', content: upload })).rejects.toBeInstanceOf(SchemaError);
    expect(datasetStore.saves).toBe(0);
  });

  it('fails when the raw export does not exist', async () => {
    await expect(service.importExport({ fileName: 'feb.csv' })).rejects.toBeInstanceOf(StorageIOError);
  });

  it('drops income rows when importing expenses only', async () => {
    const upload = [
      'Started Date,Description,Amount,Currency',
      '2024-02-01,Salary,2000,EUR',
      '2024-02-02,Grocer,-30,EUR',
    ].join('\n');

    const result = await build({ ...options, expensesOnly: true }).importExport({ fileName: 'feb.csv', content: upload });

    expect(result.filtered).toBe(1);
    expect(result.added).toBe(1);
    expect(result.summary.totalAmount).toBe(-30);
  });

  it('lists the raw exports', async () => {
    expect((await service.listRawFiles()).map((file) => file.fileName)).toEqual(['jan.csv']);
  });
});
