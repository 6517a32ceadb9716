export interface Transaction {
  date: string; // ISO calendar date, YYYY-MM-DD
  description: string;
  amount: number;
  currency: string;
  rawVendorText: string;
}

export interface TaggedTransaction extends Transaction {
  key: string;
  category: string;
  exceptional: boolean;
  tags: string[];
}

export type Dataset = TaggedTransaction[];

export const UNCATEGORIZED = 'uncategorized';

export const isUncategorized = (txn: Pick<TaggedTransaction, 'category'>): boolean =>
  txn.category === UNCATEGORIZED;

/** Category of a row whose labels include none of the main categories. */
export const OTHER_CATEGORY = 'other';
