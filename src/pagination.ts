/**
 * Pagination helpers for the paged async iterators returned by ARM SDK
 * list operations.
 */

/**
 * Drain an async iterator, mapping and optionally filtering every item.
 */
export async function collectAll<TRaw, TOut>(
  iterator: AsyncIterable<TRaw>,
  mapFn: (item: TRaw) => TOut,
  filterFn?: (item: TOut) => boolean,
): Promise<TOut[]> {
  const items: TOut[] = [];
  for await (const raw of iterator) {
    const item = mapFn(raw);
    if (!filterFn || filterFn(item)) items.push(item);
  }
  return items;
}
