/** Usage count per label, in insertion order. */
export type LabelCounts = Record<string, number>;

/** Normalized vendor key → labels the user has applied to that vendor. */
export type VendorAssociationTable = Record<string, LabelCounts>;

/** Every label ever applied, with how often. */
export type TagCatalog = LabelCounts;

export interface TaggingConfig {
  tags: TagCatalog;
  vendorTags: VendorAssociationTable;
  /** Labels that may become a row's category, highest precedence first. */
  mainCategories: string[];
}

export const emptyTaggingConfig = (): TaggingConfig => ({ tags: {}, vendorTags: {}, mainCategories: [] });

// Labels and vendor keys are user text, so lookups must ignore Object.prototype.
export const countOf = (counts: LabelCounts, label: string): number => {
  return Object.hasOwn(counts, label) ? counts[label] : 0;
};

export const withCount = (counts: LabelCounts, label: string, by: number): LabelCounts => ({
  ...counts,
  [label]: countOf(counts, label) + by,
});

export const labelsOf = (table: VendorAssociationTable, vendorKey: string): LabelCounts | undefined => {
  return Object.hasOwn(table, vendorKey) ? table[vendorKey] : undefined;
};
