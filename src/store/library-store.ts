import { Effect, Fiber, Layer, Runtime } from "effect";
import { join } from "node:path";
import {
  ConfigService,
  FileSystemService,
  LibraryStore,
  LoggerService,
  type CollectionUpdate,
  type StoreChange,
  type StoreListener,
} from "../effect/services.ts";
import { makeCollectionRecord, type CollectionRecord, type LibrarySnapshot } from "../types.ts";
import { hasErrorCode, PersistenceWriteError } from "../utils/errors.ts";
import { encodeStoreFile, loadStoreFile } from "./persistence.ts";
import { Throttler } from "./throttler.ts";

const now = (): string => new Date().toISOString();

/**
 * In-memory collection index backed by a JSON file.
 *
 * Mutations apply under a single lock and are visible as soon as their effect
 * completes; durability is deferred to a throttled flush that writes the whole
 * mapping through a temp file and a rename. The flush reads the mapping when it
 * runs, so one flush covers every mutation made before it.
 */
export const makeLibraryStore = Effect.gen(function* () {
  const config = yield* ConfigService;
  const logger = yield* LoggerService;
  const fs = yield* FileSystemService;
  const runtime = yield* Effect.runtime<never>();
  const lock = yield* Effect.makeSemaphore(1);
  const withLock = lock.withPermits(1);

  const storePath = config.storePath;
  const data = yield* loadStoreFile(storePath).pipe(
    Effect.tap((records) =>
      records === null
        ? logger.info("LibraryStore", "No store file, starting empty", { store_path: storePath })
        : logger.info("LibraryStore", "Loaded", { store_path: storePath, collections: records.size }),
    ),
    Effect.map((records) => records ?? new Map<string, CollectionRecord>()),
    Effect.catchAll((error) =>
      logger
        .error("LibraryStore", "Store file unreadable, starting empty", error, { store_path: storePath })
        .pipe(Effect.as(new Map<string, CollectionRecord>())),
    ),
  );

  const listeners = new Set<StoreListener>();
  const throttler = new Throttler({ windowMs: config.saveThrottleMs });

  const writeSnapshot = withLock(
    Effect.suspend(() => fs.atomicWrite(storePath, encodeStoreFile(data.values()))),
  ).pipe(Effect.mapError((error) => new PersistenceWriteError(storePath, error)));

  const flush = writeSnapshot.pipe(
    Effect.zipRight(logger.debug("LibraryStore", "Flushed", { event_type: "flush_complete", store_path: storePath })),
    Effect.catchAll((error) =>
      logger.error("LibraryStore", "Flush failed", error, { event_type: "flush_error", store_path: storePath }),
    ),
  );

  // Flushes started by the throttler; close() waits for them before its own write
  const inFlight = new Set<Fiber.RuntimeFiber<void>>();

  const scheduleFlush = (): void =>
    throttler.scheduleCall(() => {
      const fiber = Runtime.runFork(runtime)(flush);
      inFlight.add(fiber);
      fiber.addObserver(() => {
        inFlight.delete(fiber);
      });
    });

  const notify = (change: StoreChange) =>
    Effect.sync(() => {
      for (const listener of listeners) listener(change);
    });

  // Apply a mutation under the lock and request a flush before releasing it
  const mutate = <A>(apply: () => A) =>
    withLock(
      Effect.sync(() => {
        const result = apply();
        scheduleFlush();
        return result;
      }),
    );

  const set = (id: string, record: CollectionRecord) =>
    mutate(() => {
      data.set(id, makeCollectionRecord({ ...record, id }));
    }).pipe(Effect.zipRight(notify({ kind: "set", id })));

  const remove = (id: string) =>
    withLock(
      Effect.sync(() => {
        if (!data.delete(id)) return false;
        scheduleFlush();
        return true;
      }),
    ).pipe(Effect.tap((removed) => (removed ? notify({ kind: "delete", id }) : Effect.void)));

  const renameCollection = (fromId: string, toId: string, path: string) =>
    withLock(
      Effect.sync(() => {
        const existing = data.get(fromId);
        if (!existing) return false;

        data.delete(fromId);
        data.set(toId, makeCollectionRecord({ ...existing, id: toId, path, lastUpdated: now() }));
        scheduleFlush();
        return true;
      }),
    ).pipe(Effect.tap((renamed) => (renamed ? notify({ kind: "rename", id: toId }) : Effect.void)));

  const refreshCollection = (id: string) =>
    Effect.gen(function* () {
      const path = join(config.libraryPath, id);

      // Listing happens outside the lock
      const chapterFiles = yield* fs.readdir(path).pipe(
        Effect.map((entries) =>
          entries.filter((e) => !e.isDirectory && e.name.endsWith(config.chapterExtension)).map((e) => e.name),
        ),
        Effect.catchIf(
          (error) => hasErrorCode(error, "ENOENT", "ENOTDIR"),
          () => Effect.succeed(null),
        ),
      );

      const outcome = yield* withLock(
        Effect.sync((): CollectionUpdate => {
          const existing = data.get(id);

          if (chapterFiles === null) {
            if (!existing) return "absent";
            data.delete(id);
            scheduleFlush();
            return "removed";
          }

          const timestamp = now();
          data.set(
            id,
            makeCollectionRecord({
              id,
              path,
              createdAt: existing?.createdAt ?? timestamp,
              lastUpdated: timestamp,
              chapterFiles,
            }),
          );
          scheduleFlush();
          return existing ? "updated" : "created";
        }),
      );

      if (outcome === "removed") yield* notify({ kind: "delete", id });
      else if (outcome !== "absent") yield* notify({ kind: "set", id });

      yield* logger.debug("LibraryStore", "Collection refreshed", {
        collection: id,
        outcome,
        chapters: chapterFiles?.length,
      });
      return outcome;
    });

  return {
    get: (id: string) => withLock(Effect.sync(() => data.get(id))),
    has: (id: string) => withLock(Effect.sync(() => data.has(id))),
    size: () => withLock(Effect.sync(() => data.size)),
    set,
    delete: remove,
    snapshot: () => withLock(Effect.sync((): LibrarySnapshot => Object.freeze(Object.fromEntries(data)))),
    forceFlush: () =>
      Effect.suspend(() => {
        throttler.cancel();
        return writeSnapshot;
      }),
    refreshCollection,
    renameCollection,
    subscribe: (listener: StoreListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    close: () =>
      Effect.suspend(() => {
        throttler.dispose();
        listeners.clear();
        return Fiber.joinAll([...inFlight]).pipe(Effect.zipRight(flush));
      }),
  };
});

// Scoped so that releasing the layer cancels the pending timer and flushes
export const LibraryStoreLive = Layer.scoped(
  LibraryStore,
  Effect.acquireRelease(makeLibraryStore, (store) => store.close()),
);
