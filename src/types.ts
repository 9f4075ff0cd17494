/** One indexed collection: a first-level directory under the library root. */
export interface CollectionRecord {
  /** Directory name; also the store key. */
  readonly id: string;
  /** Absolute path of the collection directory. */
  readonly path: string;
  /** ISO-8601, set once when the record is first created. */
  readonly createdAt: string;
  /** ISO-8601, overwritten on every mutation. */
  readonly lastUpdated: string;
  /** Chapter archive names, sorted and unique. */
  readonly chapterFiles: readonly string[];
  /** Always `chapterFiles.length`; only {@link makeCollectionRecord} sets it. */
  readonly totalChapters: number;
}

/** Immutable point-in-time copy of the whole id → record mapping. */
export type LibrarySnapshot = Readonly<Record<string, CollectionRecord>>;

export interface CollectionChapterDiff {
  readonly id: string;
  readonly addedChapters: readonly string[];
  readonly removedChapters: readonly string[];
}

export interface LibraryDiff {
  readonly removedCollections: readonly string[];
  readonly addedCollections: readonly string[];
  /** Collections present on both sides whose chapter sets differ. */
  readonly changedCollections: readonly CollectionChapterDiff[];
}

export interface CollectionRecordInit {
  id: string;
  path: string;
  createdAt: string;
  lastUpdated: string;
  chapterFiles: Iterable<string>;
}

export function makeCollectionRecord(init: CollectionRecordInit): CollectionRecord {
  const chapterFiles = Object.freeze([...new Set(init.chapterFiles)].sort());
  return Object.freeze({
    id: init.id,
    path: init.path,
    createdAt: init.createdAt,
    lastUpdated: init.lastUpdated,
    chapterFiles,
    totalChapters: chapterFiles.length,
  });
}
