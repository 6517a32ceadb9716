import { TaggedTransaction } from '../../domain/entities/Transaction.js';
import { normalizeDescription } from '../../domain/services/DescriptionNormalizer.js';
import {
  DailyContext,
  PendingVendor,
  TagEdit,
  TagSuggestion,
  TaggingProgress,
  applyTransactionTags,
  applyVendorTags,
  cleanLabels,
  dailyContext,
  pendingVendors,
  setExceptional,
  suggestTags,
  taggingProgress,
  vendorTransactions,
} from '../../domain/services/Tagging.js';
import { DatasetStorePort } from '../ports/DatasetStorePort.js';
import { TaggingConfigSession } from './TaggingConfigSession.js';

export class TaggingService {
  constructor(
    private readonly datasetStore: DatasetStorePort,
    private readonly taggingConfig: TaggingConfigSession,
  ) {}

  async listTransactions(): Promise<TaggedTransaction[]> {
    return this.datasetStore.load();
  }

  async pendingVendors(): Promise<PendingVendor[]> {
    const [dataset, config] = await Promise.all([this.datasetStore.load(), this.taggingConfig.current()]);
    return pendingVendors(dataset, config.vendorTags);
  }

  async suggestTags(vendors: string[]): Promise<TagSuggestion[]> {
    return suggestTags(await this.taggingConfig.current(), vendors);
  }

  async vendorTransactions(vendors: string[]): Promise<TaggedTransaction[]> {
    return vendorTransactions(await this.datasetStore.load(), vendors);
  }

  async tagVendors(vendors: string[], edit: TagEdit): Promise<{ affected: number }> {
    const [dataset, config] = await Promise.all([this.datasetStore.load(), this.taggingConfig.current()]);
    const result = applyVendorTags(dataset, vendors, edit, config.mainCategories);

    if (result.affected === 0) {
      return { affected: 0 };
    }

    await this.datasetStore.save(result.dataset);
    await this.taggingConfig.record(result.vendorKeys, cleanLabels(edit.labels));

    console.log(`🏷️ Tagged ${result.affected} transaction(s) for ${result.vendorKeys.length} vendor(s)`);

    return { affected: result.affected };
  }

  async tagTransaction(key: string, edit: TagEdit): Promise<TaggedTransaction> {
    const labels = cleanLabels(edit.labels);
    const [dataset, config] = await Promise.all([this.datasetStore.load(), this.taggingConfig.current()]);
    const result = applyTransactionTags(dataset, key, edit, config.mainCategories);

    if (labels.length === 0) {
      return result.transaction;
    }

    await this.datasetStore.save(result.dataset);
    await this.taggingConfig.record([normalizeDescription(result.transaction.description)], labels);

    return result.transaction;
  }

  async setExceptional(key: string, exceptional: boolean): Promise<TaggedTransaction> {
    const result = setExceptional(await this.datasetStore.load(), key, exceptional);
    await this.datasetStore.save(result.dataset);

    return result.transaction;
  }

  async progress(): Promise<TaggingProgress> {
    return taggingProgress(await this.datasetStore.load());
  }

  async dailyContext(key: string): Promise<DailyContext> {
    return dailyContext(await this.datasetStore.load(), key);
  }
}
