import { Schema } from "@effect/schema";
import { Effect, Either, Predicate } from "effect";
import { FileSystemService } from "../effect/services.ts";
import { makeCollectionRecord, type CollectionRecord } from "../types.ts";
import { hasErrorCode, PersistenceLoadError } from "../utils/errors.ts";

// On-disk shape of one collection (snake_case keys are the file format)
export const PersistedCollection = Schema.Struct({
  path: Schema.String,
  created_at: Schema.String,
  last_updated: Schema.String,
  cbz_files: Schema.Array(Schema.String),
  total_chapters: Schema.optional(Schema.Number),
});

export type PersistedCollection = typeof PersistedCollection.Type;

const decodeJson = Schema.decodeUnknownEither(Schema.parseJson());
const decodeEntry = Schema.decodeUnknownEither(PersistedCollection);

/**
 * Parses the backing file. `total_chapters` is not trusted; it is derived again
 * from `cbz_files`.
 */
export function decodeStoreFile(
  content: string,
  filePath: string,
): Either.Either<Map<string, CollectionRecord>, PersistenceLoadError> {
  return Either.gen(function* () {
    const json = yield* Either.mapLeft(
      decodeJson(content),
      (error) => new PersistenceLoadError(filePath, error.message, error),
    );
    if (!Predicate.isRecord(json)) {
      return yield* Either.left(new PersistenceLoadError(filePath, "expected an object keyed by collection id"));
    }

    // Entries come straight from the parsed object, so an id such as "__proto__" stays a key
    const records = new Map<string, CollectionRecord>();
    for (const [id, value] of Object.entries(json)) {
      const entry = yield* Either.mapLeft(
        decodeEntry(value),
        (error) => new PersistenceLoadError(filePath, `${id}: ${error.message}`, error),
      );
      records.set(
        id,
        makeCollectionRecord({
          id,
          path: entry.path,
          createdAt: entry.created_at,
          lastUpdated: entry.last_updated,
          chapterFiles: entry.cbz_files,
        }),
      );
    }
    return records;
  });
}

export function encodeStoreFile(records: Iterable<CollectionRecord>): string {
  const sorted = [...records].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const entries = sorted.map((record): [string, PersistedCollection] => [
    record.id,
    {
      path: record.path,
      created_at: record.createdAt,
      last_updated: record.lastUpdated,
      cbz_files: [...record.chapterFiles],
      total_chapters: record.chapterFiles.length,
    },
  ]);

  // fromEntries defines own properties; plain assignment would treat "__proto__" as the prototype
  return `${JSON.stringify(Object.fromEntries(entries), null, 2)}\n`;
}

/**
 * Reads the backing file. Succeeds with `null` when there is no file yet and
 * fails with {@link PersistenceLoadError} when it cannot be read or decoded.
 */
export const loadStoreFile = (filePath: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystemService;

    const content = yield* fs.readFile(filePath).pipe(
      Effect.catchIf(
        (error) => hasErrorCode(error, "ENOENT"),
        () => Effect.succeed(null),
      ),
      Effect.mapError((error) => new PersistenceLoadError(filePath, error.message, error)),
    );
    if (content === null) return null;

    return yield* decodeStoreFile(content, filePath);
  });
