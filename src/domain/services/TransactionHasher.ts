import crypto from 'node:crypto';
import { normalizeDescription } from './DescriptionNormalizer.js';

export interface DatasetKeyInput {
  date: string;
  description: string;
  amount: number;
}

/**
 * Composite identity of a dataset row: date, normalized description and the
 * amount fixed to cents. Two identical charges on the same day collapse into one.
 */
export const buildDatasetKey = (input: DatasetKeyInput): string => {
  const serialized = [input.date, normalizeDescription(input.description), input.amount.toFixed(2)].join('|');

  return crypto.createHash('sha256').update(serialized).digest('hex').slice(0, 16);
};
