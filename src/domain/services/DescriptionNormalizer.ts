const repeatingWhitespace = /\s+/g;
const punctuation = /[^\p{L}\p{N}\s]/gu;
const combiningMarks = /\p{M}/gu;

/**
 * Canonical form of a merchant description, used both as the vendor key of the
 * association table and as the description part of the dataset key.
 */
export const normalizeDescription = (input: string): string => {
  return input
    .normalize('NFKD')
    .replace(combiningMarks, '')
    .replace(punctuation, ' ')
    .replace(repeatingWhitespace, ' ')
    .trim()
    .toLowerCase();
};
