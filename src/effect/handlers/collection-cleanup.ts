import { Effect } from "effect";
import { LibraryStore, LoggerService } from "../services.ts";
import type { LibraryEvent } from "../types.ts";

export const collectionCleanup = (event: LibraryEvent): Effect.Effect<void, never, LibraryStore | LoggerService> =>
  Effect.gen(function* () {
    if (event._tag !== "CollectionRemoved") return;
    const store = yield* LibraryStore;
    const logger = yield* LoggerService;

    const removed = yield* store.delete(event.id);

    if (removed) {
      yield* logger.info("CollectionCleanup", "Collection removed", { collection: event.id, path: event.path });
    } else {
      yield* logger.debug("CollectionCleanup", "Already removed", { collection: event.id });
    }
  });
