import type { ListingEntry } from './types';

/** Case-insensitive regex match on titles, e.g. `(transformer|llm|language model)`. */
export function filterPapersByTitle<T extends Pick<ListingEntry, 'title'>>(
  papers: readonly T[],
  pattern: string
): T[] {
  const regex = new RegExp(pattern, 'i');
  return papers.filter((p) => regex.test(p.title));
}
