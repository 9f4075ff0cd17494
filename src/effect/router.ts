import type { Effect } from "effect";
import { chapterSync } from "./handlers/chapter-sync.ts";
import { collectionCleanup } from "./handlers/collection-cleanup.ts";
import { collectionRename } from "./handlers/collection-rename.ts";
import { collectionSync } from "./handlers/collection-sync.ts";
import type { ConfigService, LibraryStore, LoggerService } from "./services.ts";
import type { RelevantLibraryEvent } from "./types.ts";

export const handleEvent = (
  event: RelevantLibraryEvent,
): Effect.Effect<void, Error, ConfigService | LibraryStore | LoggerService> => {
  switch (event._tag) {
    case "CollectionCreated":
      return collectionSync(event);

    case "CollectionRemoved":
      return collectionCleanup(event);

    case "CollectionRenamed":
      return collectionRename(event);

    case "ChapterAdded":
    case "ChapterRemoved":
    case "ChapterRenamed":
      return chapterSync(event);
  }
};
