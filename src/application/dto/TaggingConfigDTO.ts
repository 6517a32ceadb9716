import { z } from 'zod';
import { VendorAssociationTable, labelsOf, withCount } from '../../domain/entities/VendorAssociation.js';
import { normalizeDescription } from '../../domain/services/DescriptionNormalizer.js';

export const TagCatalogSchema = z.record(z.string(), z.number().int().nonnegative());

/**
 * vendor_tags.json. A vendor may map to a single label (`"coffee shop": "Food"`)
 * or to label usage counts (`"coffee shop": { "Food": 3 }`). Keys are normalized
 * on read so hand-edited files match lookups.
 */
export const VendorTagsFileSchema = z
  .record(z.string(), z.union([z.string().min(1), TagCatalogSchema]))
  .transform((entries): VendorAssociationTable => {
    const table: VendorAssociationTable = {};

    for (const [vendor, value] of Object.entries(entries)) {
      const key = normalizeDescription(vendor);
      const labels = typeof value === 'string' ? { [value]: 1 } : value;

      table[key] = Object.entries(labels).reduce(
        (counts, [label, count]) => withCount(counts, label, count),
        labelsOf(table, key) ?? {},
      );
    }

    return table;
  });

/** main_categories.json: labels that may become a row's category, highest precedence first. */
export const MainCategoriesSchema = z
  .array(z.string().trim().min(1))
  .transform((labels) => Array.from(new Set(labels)));
