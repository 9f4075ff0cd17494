// Raw notification from a notification source
export interface RawNotification {
  readonly kind: "created" | "deleted" | "moved";
  readonly isDirectory: boolean;
  readonly sourcePath: string;
  /** Only set for `moved`. */
  readonly destPath?: string;
}

export type IgnoredReason = "not-in-library" | "ambiguous";

// Classified event types for handlers
export type LibraryEvent =
  | { _tag: "CollectionCreated"; id: string; path: string }
  | { _tag: "CollectionRemoved"; id: string; path: string }
  | { _tag: "CollectionRenamed"; fromId: string; toId: string; path: string }
  | { _tag: "ChapterAdded"; collection: string; name: string }
  | { _tag: "ChapterRemoved"; collection: string; name: string }
  | {
      _tag: "ChapterRenamed";
      fromCollection: string;
      fromName: string;
      collection: string;
      name: string;
    }
  | { _tag: "Ignored"; reason: IgnoredReason };

export type RelevantLibraryEvent = Exclude<LibraryEvent, { _tag: "Ignored" }>;
