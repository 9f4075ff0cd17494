import { Effect, Runtime } from "effect";
import { LibraryStore, LoggerService } from "./effect/services.ts";
import { isEmptyDiff, reconcile } from "./reconcile.ts";
import { Throttler } from "./store/throttler.ts";
import type { LibraryDiff, LibrarySnapshot } from "./types.ts";

/** Receives reconciled library changes. */
export interface LibraryChangeListener {
  collectionsRemoved(ids: readonly string[]): Effect.Effect<void, Error>;
  collectionsAdded(ids: readonly string[]): Effect.Effect<void, Error>;
  chaptersAdded(collection: string, chapters: readonly string[]): Effect.Effect<void, Error>;
  chaptersRemoved(collection: string, chapters: readonly string[]): Effect.Effect<void, Error>;
}

export interface LibraryUpdater {
  /** Requests a throttled reconcile-and-dispatch run. */
  readonly schedule: () => void;
  /** Runs a reconcile-and-dispatch immediately; yields the dispatched diff. */
  readonly flush: Effect.Effect<LibraryDiff>;
  readonly close: Effect.Effect<void>;
}

export const makeLoggingListener = Effect.gen(function* () {
  const logger = yield* LoggerService;
  const listener: LibraryChangeListener = {
    collectionsRemoved: (ids) => logger.info("Library", "Collections removed", { removed_collections: [...ids] }),
    collectionsAdded: (ids) => logger.info("Library", "Collections added", { added_collections: [...ids] }),
    chaptersAdded: (collection, chapters) =>
      logger.info("Library", "Chapters added", { collection, added_chapters: [...chapters] }),
    chaptersRemoved: (collection, chapters) =>
      logger.info("Library", "Chapters removed", { collection, removed_chapters: [...chapters] }),
  };
  return listener;
});

/**
 * Compares the store against the snapshot taken at the previous run and hands
 * the differences to `listener`. Store mutations schedule runs through a
 * throttler, so a burst of mutations yields one dispatch.
 */
export const makeLibraryUpdater = (listener: LibraryChangeListener, throttleMs: number) =>
  Effect.gen(function* () {
    const store = yield* LibraryStore;
    const logger = yield* LoggerService;
    const runtime = yield* Effect.runtime<never>();
    const runLock = (yield* Effect.makeSemaphore(1)).withPermits(1);
    const throttler = new Throttler({ windowMs: throttleMs });

    let previous: LibrarySnapshot = yield* store.snapshot();

    const guard = (step: string, effect: Effect.Effect<void, Error>) =>
      effect.pipe(Effect.catchAll((error) => logger.error("LibraryUpdater", `Listener failed: ${step}`, error)));

    const dispatch = (diff: LibraryDiff, current: LibrarySnapshot) =>
      Effect.gen(function* () {
        if (diff.removedCollections.length > 0) {
          yield* guard("collectionsRemoved", listener.collectionsRemoved(diff.removedCollections));
        }
        if (diff.addedCollections.length > 0) {
          yield* guard("collectionsAdded", listener.collectionsAdded(diff.addedCollections));
        }
        // New collections carry all of their chapters once
        for (const id of diff.addedCollections) {
          const chapters = current[id]?.chapterFiles ?? [];
          if (chapters.length > 0) yield* guard("chaptersAdded", listener.chaptersAdded(id, chapters));
        }
        for (const change of diff.changedCollections) {
          if (change.addedChapters.length > 0) {
            yield* guard("chaptersAdded", listener.chaptersAdded(change.id, change.addedChapters));
          }
          if (change.removedChapters.length > 0) {
            yield* guard("chaptersRemoved", listener.chaptersRemoved(change.id, change.removedChapters));
          }
        }
      });

    const run = runLock(
      Effect.gen(function* () {
        const current = yield* store.snapshot();
        const diff = reconcile(previous, current);
        previous = current;

        if (!isEmptyDiff(diff)) {
          yield* dispatch(diff, current);
          yield* logger.debug("LibraryUpdater", "Diff dispatched", {
            event_type: "diff_dispatched",
            added_collections: [...diff.addedCollections],
            removed_collections: [...diff.removedCollections],
          });
        }
        return diff;
      }),
    );

    const schedule = () =>
      throttler.scheduleCall(() => {
        Runtime.runFork(runtime)(run);
      });

    const unsubscribe = store.subscribe(schedule);

    const updater: LibraryUpdater = {
      schedule,
      flush: Effect.suspend(() => {
        throttler.cancel();
        return run;
      }),
      close: Effect.sync(() => {
        unsubscribe();
        throttler.dispose();
      }),
    };
    return updater;
  });
