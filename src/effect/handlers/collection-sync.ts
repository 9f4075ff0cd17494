import { Effect } from "effect";
import { LibraryStore, LoggerService } from "../services.ts";
import type { LibraryEvent } from "../types.ts";

export const collectionSync = (event: LibraryEvent): Effect.Effect<void, Error, LibraryStore | LoggerService> =>
  Effect.gen(function* () {
    if (event._tag !== "CollectionCreated") return;
    const store = yield* LibraryStore;
    const logger = yield* LoggerService;

    const outcome = yield* store.refreshCollection(event.id);

    yield* logger.info("CollectionSync", "Collection detected", {
      collection: event.id,
      path: event.path,
      outcome,
    });
  });
