import { TaggedTransaction, isUncategorized } from '../../domain/entities/Transaction.js';
import { normalizeDescription } from '../../domain/services/DescriptionNormalizer.js';
import { mergeDataset } from '../../domain/services/MergeEngine.js';
import { tagTransactions } from '../../domain/services/TagResolver.js';
import { PendingVendor, pendingVendors } from '../../domain/services/Tagging.js';
import { SkippedRowDTO } from '../dto/ParsedExportDTO.js';
import { DatasetStorePort } from '../ports/DatasetStorePort.js';
import { ExportParseOptions, ExportParserPort } from '../ports/ExportParserPort.js';
import { RawExportFile, RawExportSourcePort } from '../ports/RawExportSourcePort.js';
import { TaggingConfigSession } from './TaggingConfigSession.js';

export interface ImportExportParams {
  fileName: string;
  /** Uploaded file contents; when absent the file is read from the raw export directory. */
  content?: string;
}

export interface ImportSummary {
  fileName: string;
  totalRows: number;
  parsed: number;
  skipped: SkippedRowDTO[];
  filtered: number;
  added: number;
  preserved: number;
  pendingVendors: PendingVendor[];
  summary: {
    totalAmount: number;
    largestExpense?: number;
    smallestExpense?: number;
    knownVendors: number;
    unknownVendors: number;
  };
}

export class ImportService {
  constructor(
    private readonly parser: ExportParserPort,
    private readonly datasetStore: DatasetStorePort,
    private readonly rawSource: RawExportSourcePort,
    private readonly taggingConfig: TaggingConfigSession,
    private readonly parseOptions: ExportParseOptions,
  ) {}

  async listRawFiles(): Promise<RawExportFile[]> {
    return this.rawSource.list();
  }

  async importExport(params: ImportExportParams): Promise<ImportSummary> {
    const content = params.content ?? (await this.rawSource.read(params.fileName));
    const parsed = await this.parser.parse(content, this.parseOptions);
    const config = await this.taggingConfig.current();

    const tagged = tagTransactions(parsed.transactions, config.vendorTags, config.mainCategories);
    const existing = await this.datasetStore.load();
    const merge = mergeDataset(existing, tagged);

    if (merge.added > 0) {
      await this.datasetStore.save(merge.dataset);
    }

    const result: ImportSummary = {
      fileName: params.fileName,
      totalRows: parsed.totalRows,
      parsed: parsed.transactions.length,
      skipped: parsed.skipped,
      filtered: parsed.filtered,
      added: merge.added,
      preserved: merge.preserved,
      pendingVendors: pendingVendors(merge.dataset, config.vendorTags),
      summary: this.summarize(tagged),
    };

    console.log('📥 Export imported:', {
      fileName: result.fileName,
      totalRows: result.totalRows,
      skipped: result.skipped.length,
      added: result.added,
      preserved: result.preserved,
      pendingVendors: result.pendingVendors.length,
    });

    return result;
  }

  private summarize(transactions: TaggedTransaction[]): ImportSummary['summary'] {
    const expenses = transactions.filter((txn) => txn.amount < 0).map((txn) => Math.abs(txn.amount));
    const known = new Set<string>();
    const unknown = new Set<string>();

    transactions.forEach((txn) => {
      const vendorKey = normalizeDescription(txn.description);
      (isUncategorized(txn) ? unknown : known).add(vendorKey);
    });

    return {
      totalAmount: transactions.reduce((sum, txn) => sum + Math.round(txn.amount * 100), 0) / 100,
      largestExpense: expenses.length ? Math.max(...expenses) : undefined,
      smallestExpense: expenses.length ? Math.min(...expenses) : undefined,
      knownVendors: known.size,
      unknownVendors: unknown.size,
    };
  }
}
