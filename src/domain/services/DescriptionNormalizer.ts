const repeatingWhitespace = /\s+/g;

/**
 * Comparison key for descriptions when fingerprinting whole statements.
 * Never used to rewrite a stored description.
 */
export const normalizeDescription = (input: string): string => {
  return input.normalize('NFKD').replace(repeatingWhitespace, ' ').trim().toUpperCase();
};
