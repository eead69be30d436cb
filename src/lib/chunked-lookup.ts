/**
 * Run a set-membership query in chunks of at most `chunkSize` ids and union
 * the partial results. The output is sorted and de-duplicated, so it equals
 * what a single unbounded `IN (...)` would return.
 */
export async function lookupInChunks(
  ids: Iterable<number>,
  chunkSize: number,
  fetchChunk: (chunk: number[]) => Promise<Iterable<number>>,
): Promise<number[]> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const unique = [...new Set(ids)];
  const found = new Set<number>();

  for (let offset = 0; offset < unique.length; offset += chunkSize) {
    const chunk = unique.slice(offset, offset + chunkSize);
    for (const id of await fetchChunk(chunk)) {
      found.add(id);
    }
  }

  return [...found].sort((a, b) => a - b);
}
