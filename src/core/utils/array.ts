/**
 * Array utilities
 */

/**
 * Removes duplicate elements from an array, keeping first occurrences in order
 * @param arr - Array to deduplicate
 * @returns New array with unique elements only
 */
export function uniq<T>(arr: readonly T[]): T[] {
  return Array.from(new Set(arr));
}
