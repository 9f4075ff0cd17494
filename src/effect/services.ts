import { Context, Effect, Layer } from "effect";
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Config } from "../config.ts";
import { TMP_SUFFIX } from "../constants.ts";
import { log } from "../logging/logger.ts";
import type { LogContext } from "../logging/types.ts";
import type { CollectionRecord, LibrarySnapshot } from "../types.ts";
import { toError, type PersistenceWriteError } from "../utils/errors.ts";

// Config Service
export class ConfigService extends Context.Tag("ConfigService")<ConfigService, Readonly<Config>>() {}

// Logger Service
export class LoggerService extends Context.Tag("LoggerService")<
  LoggerService,
  {
    readonly info: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly warn: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly error: (tag: string, msg: string, err?: unknown, ctx?: LogContext) => Effect.Effect<void>;
    readonly debug: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
  }
>() {}

export interface DirEntry {
  readonly name: string;
  readonly isDirectory: boolean;
}

// FileSystem Service
export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readdir: (path: string) => Effect.Effect<readonly DirEntry[], Error>;
    readonly stat: (path: string) => Effect.Effect<{ isDirectory: () => boolean }, Error>;
    readonly readFile: (path: string) => Effect.Effect<string, Error>;
    readonly atomicWrite: (path: string, content: string) => Effect.Effect<void, Error>;
  }
>() {}

/** Outcome of re-deriving one collection from its directory listing. */
export type CollectionUpdate = "created" | "updated" | "removed" | "absent";

export interface StoreChange {
  readonly kind: "set" | "delete" | "rename";
  readonly id: string;
}

export type StoreListener = (change: StoreChange) => void;

// Library Store Service
export class LibraryStore extends Context.Tag("LibraryStore")<
  LibraryStore,
  {
    readonly get: (id: string) => Effect.Effect<CollectionRecord | undefined>;
    readonly has: (id: string) => Effect.Effect<boolean>;
    readonly size: () => Effect.Effect<number>;
    readonly set: (id: string, record: CollectionRecord) => Effect.Effect<void>;
    readonly delete: (id: string) => Effect.Effect<boolean>;
    readonly snapshot: () => Effect.Effect<LibrarySnapshot>;
    readonly forceFlush: () => Effect.Effect<void, PersistenceWriteError>;
    readonly refreshCollection: (id: string) => Effect.Effect<CollectionUpdate, Error>;
    readonly renameCollection: (fromId: string, toId: string, path: string) => Effect.Effect<boolean>;
    readonly subscribe: (listener: StoreListener) => () => void;
    readonly close: () => Effect.Effect<void>;
  }
>() {}

// Live implementations

export const makeConfigLayer = (config: Config) => Layer.succeed(ConfigService, config);

export const LiveLoggerService = Layer.succeed(LoggerService, {
  info: (tag, msg, ctx) => Effect.sync(() => log.info(tag, msg, ctx)),
  warn: (tag, msg, ctx) => Effect.sync(() => log.warn(tag, msg, ctx)),
  error: (tag, msg, err, ctx) => Effect.sync(() => log.error(tag, msg, err, ctx)),
  debug: (tag, msg, ctx) => Effect.sync(() => log.debug(tag, msg, ctx)),
});

export const LiveFileSystemService = Layer.succeed(FileSystemService, {
  readdir: (path) =>
    Effect.tryPromise({
      try: () => readdir(path, { withFileTypes: true }),
      catch: toError,
    }).pipe(Effect.map((entries) => entries.map((e) => ({ name: e.name, isDirectory: e.isDirectory() })))),

  stat: (path) =>
    Effect.tryPromise({
      try: () => stat(path),
      catch: toError,
    }).pipe(Effect.map((s) => ({ isDirectory: () => s.isDirectory() }))),

  readFile: (path) =>
    Effect.tryPromise({
      try: () => readFile(path, "utf-8"),
      catch: toError,
    }),

  atomicWrite: (path, content) =>
    Effect.tryPromise({
      try: async () => {
        const tmpPath = `${path}${TMP_SUFFIX}`;
        try {
          await mkdir(dirname(path), { recursive: true });
          await writeFile(tmpPath, content, "utf-8");
          await rename(tmpPath, path);
        } catch (error) {
          await rm(tmpPath, { force: true });
          throw error;
        }
      },
      catch: toError,
    }),
});
