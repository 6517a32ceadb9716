import { Dataset, TaggedTransaction, isUncategorized } from '../entities/Transaction.js';
import { LabelCounts, TaggingConfig, VendorAssociationTable, countOf, labelsOf, withCount } from '../entities/VendorAssociation.js';
import { NotFoundError } from '../errors/PipelineErrors.js';
import { normalizeDescription } from './DescriptionNormalizer.js';
import { splitLabels } from './TagResolver.js';

export interface PendingVendor {
  vendor: string;
  vendorKey: string;
  total: number;
  count: number;
  known: boolean;
}

export interface TagSuggestion {
  label: string;
  count: number;
  suggested: boolean;
}

export interface TaggingProgress {
  total: number;
  tagged: number;
  untagged: number;
  percentage: number;
}

export interface DailyContext {
  date: string;
  total: number;
  count: number;
  tagged: number;
  untagged: number;
  transactions: Array<TaggedTransaction & { selected: boolean }>;
}

export interface TagEdit {
  labels: string[];
  exceptional?: boolean;
}

const cents = (amount: number): number => Math.round(amount * 100);

const vendorKeysOf = (vendors: string[]): Set<string> => new Set(vendors.map(normalizeDescription));

/** Trimmed, non-empty and de-duplicated, first occurrence kept. */
export const cleanLabels = (labels: string[]): string[] => {
  return Array.from(new Set(labels.map((label) => label.trim()).filter((label) => label.length > 0)));
};

const applyEdit = (
  txn: TaggedTransaction,
  labels: string[],
  mainCategories: string[],
  exceptional?: boolean,
): TaggedTransaction => {
  const { category, tags } = splitLabels(labels, mainCategories);

  return {
    ...txn,
    category,
    tags,
    exceptional: exceptional ?? txn.exceptional,
  };
};

const findRow = (dataset: Dataset, key: string): TaggedTransaction => {
  const row = dataset.find((txn) => txn.key === key);

  if (!row) {
    throw new NotFoundError(`Transaction ${key} not found`);
  }

  return row;
};

/**
 * Uncategorized rows grouped by vendor. Vendors already present in the
 * association table come first; each group is ordered by absolute spend.
 */
export const pendingVendors = (dataset: Dataset, table: VendorAssociationTable): PendingVendor[] => {
  const groups = new Map<string, { vendor: string; cents: number; count: number }>();

  dataset.filter(isUncategorized).forEach((txn) => {
    const vendorKey = normalizeDescription(txn.description);
    const group = groups.get(vendorKey) ?? { vendor: txn.description, cents: 0, count: 0 };
    group.cents += cents(txn.amount);
    group.count += 1;
    groups.set(vendorKey, group);
  });

  return Array.from(groups.entries())
    .map(([vendorKey, group]) => ({
      vendor: group.vendor,
      vendorKey,
      total: group.cents / 100,
      count: group.count,
      known: Object.hasOwn(table, vendorKey),
    }))
    .sort(
      (a, b) =>
        Number(b.known) - Number(a.known) || Math.abs(b.total) - Math.abs(a.total) || a.vendor.localeCompare(b.vendor),
    );
};

export const vendorTransactions = (dataset: Dataset, vendors: string[]): TaggedTransaction[] => {
  const keys = vendorKeysOf(vendors);

  return dataset
    .filter((txn) => isUncategorized(txn) && keys.has(normalizeDescription(txn.description)))
    .sort((a, b) => a.date.localeCompare(b.date) || Math.abs(b.amount) - Math.abs(a.amount));
};

export const suggestTags = (config: TaggingConfig, vendors: string[]): TagSuggestion[] => {
  const suggested = new Set<string>();

  vendorKeysOf(vendors).forEach((vendorKey) => {
    Object.keys(labelsOf(config.vendorTags, vendorKey) ?? {}).forEach((label) => suggested.add(label));
  });

  const usage = (label: string): number => countOf(config.tags, label);
  const byUsage = (a: string, b: string): number => usage(b) - usage(a) || a.localeCompare(b);

  const first = Array.from(suggested)
    .sort(byUsage)
    .map((label) => ({ label, count: usage(label), suggested: true }));
  const rest = Object.keys(config.tags)
    .filter((label) => !suggested.has(label))
    .sort(byUsage)
    .map((label) => ({ label, count: usage(label), suggested: false }));

  return [...first, ...rest];
};

/** Tags every uncategorized row of the given vendors. */
export const applyVendorTags = (
  dataset: Dataset,
  vendors: string[],
  edit: TagEdit,
  mainCategories: string[] = [],
): { dataset: Dataset; affected: number; vendorKeys: string[] } => {
  const labels = cleanLabels(edit.labels);
  const keys = vendorKeysOf(vendors);
  const touched = new Set<string>();

  if (labels.length === 0) {
    return { dataset, affected: 0, vendorKeys: [] };
  }

  const updated = dataset.map((txn) => {
    const vendorKey = normalizeDescription(txn.description);

    if (!isUncategorized(txn) || !keys.has(vendorKey)) {
      return txn;
    }

    touched.add(vendorKey);
    return applyEdit(txn, labels, mainCategories, edit.exceptional);
  });

  const affected = updated.filter((txn, index) => txn !== dataset[index]).length;

  return { dataset: updated, affected, vendorKeys: Array.from(touched) };
};

/** Manual edit of one row; already-categorized rows may be re-tagged. */
export const applyTransactionTags = (
  dataset: Dataset,
  key: string,
  edit: TagEdit,
  mainCategories: string[] = [],
): { dataset: Dataset; transaction: TaggedTransaction } => {
  const labels = cleanLabels(edit.labels);
  const target = findRow(dataset, key);

  if (labels.length === 0) {
    return { dataset, transaction: target };
  }

  const transaction = applyEdit(target, labels, mainCategories, edit.exceptional);

  return {
    dataset: dataset.map((txn) => (txn.key === key ? transaction : txn)),
    transaction,
  };
};

export const setExceptional = (
  dataset: Dataset,
  key: string,
  exceptional: boolean,
): { dataset: Dataset; transaction: TaggedTransaction } => {
  const transaction = { ...findRow(dataset, key), exceptional };

  return {
    dataset: dataset.map((txn) => (txn.key === key ? transaction : txn)),
    transaction,
  };
};

/** +1 per label in the catalog, and per label for each vendor. */
export const recordTagging = (config: TaggingConfig, vendorKeys: string[], labels: string[]): TaggingConfig => {
  const increment = (counts: LabelCounts): LabelCounts => labels.reduce((acc, label) => withCount(acc, label, 1), counts);
  const vendorTags: VendorAssociationTable = { ...config.vendorTags };

  for (const vendorKey of vendorKeys) {
    vendorTags[vendorKey] = increment(labelsOf(vendorTags, vendorKey) ?? {});
  }

  return { ...config, tags: increment(config.tags), vendorTags };
};

export const taggingProgress = (dataset: Dataset): TaggingProgress => {
  const total = dataset.length;
  const untagged = dataset.filter(isUncategorized).length;
  const tagged = total - untagged;

  return {
    total,
    tagged,
    untagged,
    percentage: total > 0 ? Math.round((tagged / total) * 1000) / 10 : 0,
  };
};

export const dailyContext = (dataset: Dataset, key: string): DailyContext => {
  const selected = findRow(dataset, key);
  const sameDay = dataset
    .filter((txn) => txn.date === selected.date)
    .sort((a, b) => Math.abs(b.amount) - Math.abs(a.amount))
    .map((txn) => ({ ...txn, selected: txn.key === key }));
  const untagged = sameDay.filter(isUncategorized).length;

  return {
    date: selected.date,
    total: sameDay.reduce((sum, txn) => sum + cents(txn.amount), 0) / 100,
    count: sameDay.length,
    tagged: sameDay.length - untagged,
    untagged,
    transactions: sameDay,
  };
};
