import type { CollectionChapterDiff, LibraryDiff, LibrarySnapshot } from "./types.ts";

function difference(from: Iterable<string>, without: ReadonlySet<string>): string[] {
  const result: string[] = [];
  for (const item of from) {
    if (!without.has(item)) result.push(item);
  }
  return result.sort();
}

/**
 * Compares two snapshots.
 *
 * Chapters of added or removed collections are not listed separately: they
 * travel with the collection itself. Output lists are sorted, so the result
 * depends only on the two snapshots.
 */
export function reconcile(previous: LibrarySnapshot, current: LibrarySnapshot): LibraryDiff {
  const previousIds = new Set(Object.keys(previous));
  const currentIds = new Set(Object.keys(current));

  const changedCollections: CollectionChapterDiff[] = [];
  for (const id of [...currentIds].sort()) {
    // Own keys only: an id such as "constructor" must not resolve to Object.prototype
    const before = Object.hasOwn(previous, id) ? previous[id] : undefined;
    const after = current[id];
    if (!before || !after) continue;

    const addedChapters = difference(after.chapterFiles, new Set(before.chapterFiles));
    const removedChapters = difference(before.chapterFiles, new Set(after.chapterFiles));
    if (addedChapters.length > 0 || removedChapters.length > 0) {
      changedCollections.push({ id, addedChapters, removedChapters });
    }
  }

  return {
    removedCollections: difference(previousIds, currentIds),
    addedCollections: difference(currentIds, previousIds),
    changedCollections,
  };
}

export function isEmptyDiff(diff: LibraryDiff): boolean {
  return (
    diff.removedCollections.length === 0 &&
    diff.addedCollections.length === 0 &&
    diff.changedCollections.length === 0
  );
}
