import { OTHER_CATEGORY, TaggedTransaction, Transaction, UNCATEGORIZED } from '../entities/Transaction.js';
import { LabelCounts, VendorAssociationTable, labelsOf } from '../entities/VendorAssociation.js';
import { normalizeDescription } from './DescriptionNormalizer.js';
import { buildDatasetKey } from './TransactionHasher.js';

/** Highest count wins; on a tie the label recorded first. */
export const dominantLabel = (labels: LabelCounts | undefined): string | undefined => {
  if (!labels) {
    return undefined;
  }

  let best: string | undefined;
  let bestCount = 0;

  for (const [label, count] of Object.entries(labels)) {
    if (count > bestCount) {
      best = label;
      bestCount = count;
    }
  }

  return best;
};

/**
 * Splits cleaned labels into a category and secondary tags. Without main
 * categories the first label is the category; with them, the listed label of
 * highest precedence is, or `other` when none of the labels is listed.
 */
export const splitLabels = (labels: string[], mainCategories: string[]): { category: string; tags: string[] } => {
  if (mainCategories.length === 0) {
    const [category = UNCATEGORIZED, ...tags] = labels;
    return { category, tags };
  }

  const category = mainCategories.find((main) => labels.includes(main)) ?? OTHER_CATEGORY;
  return { category, tags: labels.filter((label) => label !== category) };
};

export const resolveCategory = (
  transaction: Transaction,
  table: VendorAssociationTable,
  mainCategories: string[] = [],
): string => {
  const labels = labelsOf(table, normalizeDescription(transaction.description));

  if (!labels || mainCategories.length === 0) {
    return dominantLabel(labels) ?? UNCATEGORIZED;
  }

  const main = Object.fromEntries(Object.entries(labels).filter(([label]) => mainCategories.includes(label)));
  const fallback = dominantLabel(labels) === undefined ? UNCATEGORIZED : OTHER_CATEGORY;

  return dominantLabel(main) ?? fallback;
};

export const tagTransactions = (
  transactions: Transaction[],
  table: VendorAssociationTable,
  mainCategories: string[] = [],
): TaggedTransaction[] => {
  return transactions.map((txn) => ({
    ...txn,
    key: buildDatasetKey(txn),
    category: resolveCategory(txn, table, mainCategories),
    exceptional: false,
    tags: [],
  }));
};
