/**
 * Helpers for async line and record streams
 */

/**
 * Drain an async iterable into an array
 *
 * @example
 * ```typescript
 * const peaks = await collect(new BedParser().parseFile("peaks.bed"));
 * ```
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
