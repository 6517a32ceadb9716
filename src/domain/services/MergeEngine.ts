import { Dataset, TaggedTransaction } from '../entities/Transaction.js';

export interface MergeResult {
  dataset: Dataset;
  added: number;
  preserved: number;
}

/**
 * Appends incoming rows whose key is not yet known. Rows already in the
 * dataset keep their category, tags and exceptional flag.
 */
export const mergeDataset = (existing: Dataset, incoming: TaggedTransaction[]): MergeResult => {
  const seen = new Set(existing.map((txn) => txn.key));
  const dataset = [...existing];
  let added = 0;
  let preserved = 0;

  for (const txn of incoming) {
    if (seen.has(txn.key)) {
      preserved += 1;
      continue;
    }

    seen.add(txn.key);
    dataset.push(txn);
    added += 1;
  }

  return { dataset, added, preserved };
};
