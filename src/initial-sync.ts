import { Effect } from "effect";
import { ConfigService, FileSystemService, LibraryStore, LoggerService } from "./effect/services.ts";
import { hasErrorCode, InvalidRootError } from "./utils/errors.ts";

export interface InitialSyncResult {
  scanned: number;
  created: number;
  updated: number;
  removed: number;
}

/**
 * Brings the store in line with the library root before watching starts:
 * every first-level directory is re-indexed and records without a directory
 * are dropped. A collection that fails is logged and skipped.
 */
export const initialSync = Effect.gen(function* () {
  const config = yield* ConfigService;
  const logger = yield* LoggerService;
  const fs = yield* FileSystemService;
  const store = yield* LibraryStore;
  const root = config.libraryPath;

  yield* logger.info("InitialSync", "Starting initial sync...", { root });
  const startTime = Date.now();

  const entries = yield* fs
    .readdir(root)
    .pipe(
      Effect.mapError(
        (error) =>
          new InvalidRootError(root, hasErrorCode(error, "ENOENT") ? "does not exist" : error.message, error),
      ),
    );
  const onDisk = new Set(entries.filter((e) => e.isDirectory).map((e) => e.name));
  const indexed = Object.keys(yield* store.snapshot());

  const result: InitialSyncResult = { scanned: onDisk.size, created: 0, updated: 0, removed: 0 };

  for (const id of [...new Set([...onDisk, ...indexed])].sort()) {
    const outcome = yield* store.refreshCollection(id).pipe(
      Effect.catchAll((error) =>
        logger.warn("InitialSync", "Failed to index collection", { collection: id, error: error.message }).pipe(
          Effect.as(null),
        ),
      ),
    );

    if (outcome === "created") result.created++;
    else if (outcome === "updated") result.updated++;
    else if (outcome === "removed") result.removed++;
  }

  yield* logger.info("InitialSync", `Completed in ${Date.now() - startTime}ms`, { ...result });
  return result;
});
