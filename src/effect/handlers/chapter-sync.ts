import { Effect } from "effect";
import { ConfigService, LibraryStore, LoggerService } from "../services.ts";
import type { LibraryEvent } from "../types.ts";

/**
 * Chapter changes re-read the whole collection directory instead of patching
 * the chapter set, so the record always matches what is on disk.
 */
export const chapterSync = (
  event: LibraryEvent,
): Effect.Effect<void, Error, ConfigService | LibraryStore | LoggerService> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const store = yield* LibraryStore;
    const logger = yield* LoggerService;
    const isChapter = (name: string) => name.endsWith(config.chapterExtension);

    // Collections whose chapter set may have changed
    const affected = new Set<string>();
    switch (event._tag) {
      case "ChapterAdded":
      case "ChapterRemoved":
        if (isChapter(event.name)) affected.add(event.collection);
        break;
      case "ChapterRenamed":
        if (isChapter(event.fromName)) affected.add(event.fromCollection);
        if (isChapter(event.name)) affected.add(event.collection);
        break;
      default:
        return;
    }

    if (affected.size === 0) {
      yield* logger.debug("ChapterSync", "Not a chapter archive", { event_tag: event._tag, chapter: event.name });
      return;
    }

    for (const collection of affected) {
      const outcome = yield* store.refreshCollection(collection);
      yield* logger.info("ChapterSync", "Chapters refreshed", {
        event_tag: event._tag,
        collection,
        chapter: event.name,
        outcome,
      });
    }
  });
