/**
 * Removes trailing characters from a string without using regex.
 *
 * This function iteratively checks each character from the end of the string
 * and removes any consecutive characters that match the specified characters to remove.
 * It uses a direct character-by-character approach instead of regex to avoid potential
 * backtracking issues and ensure consistent O(n) performance.
 *
 * @param {string} input - The string to process
 * @param {string[]} charactersToRemove - Array of characters to remove from the end
 * @returns {string} The input string with all trailing specified characters removed
 *
 * @example
 * // Returns "fix typo"
 * removeTrailingCharacters("fix typo...", ["."])
 */
export function removeTrailingCharacters(input: string, charactersToRemove: string[]): string {
  let endIndex = input.length;
  while (endIndex > 0 && charactersToRemove.includes(input[endIndex - 1])) {
    endIndex--;
  }

  return input.slice(0, endIndex);
}

/**
 * Splits a string on runs of whitespace, ignoring leading and trailing whitespace.
 *
 * @example
 * // Returns ["a", "b", "c"]
 * splitWords("  a   b  c ")
 */
export function splitWords(input: string): string[] {
  const trimmed = input.trim();
  if (trimmed === '') {
    return [];
  }

  return trimmed.split(/\s+/);
}
