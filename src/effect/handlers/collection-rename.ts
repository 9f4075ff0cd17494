import { Effect } from "effect";
import { LibraryStore, LoggerService } from "../services.ts";
import type { LibraryEvent } from "../types.ts";

/**
 * Moves the record to its new key, keeping `created_at`. When the old id was
 * never indexed the new directory is indexed from scratch instead.
 */
export const collectionRename = (event: LibraryEvent): Effect.Effect<void, Error, LibraryStore | LoggerService> =>
  Effect.gen(function* () {
    if (event._tag !== "CollectionRenamed") return;
    const { fromId, toId, path } = event;
    const store = yield* LibraryStore;
    const logger = yield* LoggerService;

    const migrated = yield* store.renameCollection(fromId, toId, path);
    if (migrated) {
      yield* logger.info("CollectionRename", "Collection renamed", { from: fromId, to: toId, path });
      return;
    }

    const outcome = yield* store.refreshCollection(toId);
    yield* logger.info("CollectionRename", "Unknown source, indexed as new", {
      from: fromId,
      to: toId,
      path,
      outcome,
    });
  });
