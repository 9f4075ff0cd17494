import { Effect } from "effect";
import { basename, dirname, isAbsolute, resolve } from "node:path";
import type { LibraryEvent, RawNotification, RelevantLibraryEvent } from "../types.ts";
import { ConfigService, LoggerService } from "../services.ts";

// A collection is a directory whose parent is the root
function isCollectionPath(path: string, root: string): boolean {
  return path !== root && dirname(path) === root;
}

// A chapter is a file whose grandparent is the root
function isChapterPath(path: string, root: string): boolean {
  return isCollectionPath(dirname(path), root);
}

function collectionEvent(kind: "created" | "deleted", path: string): LibraryEvent {
  const id = basename(path);
  return kind === "created"
    ? { _tag: "CollectionCreated", id, path }
    : { _tag: "CollectionRemoved", id, path };
}

function chapterEvent(kind: "created" | "deleted", path: string): LibraryEvent {
  const collection = basename(dirname(path));
  const name = basename(path);
  return kind === "created"
    ? { _tag: "ChapterAdded", collection, name }
    : { _tag: "ChapterRemoved", collection, name };
}

function classifyMove(source: string, dest: string, isDirectory: boolean, root: string): LibraryEvent {
  if (isDirectory) {
    const fromRoot = isCollectionPath(source, root);
    const toRoot = isCollectionPath(dest, root);

    if (fromRoot && toRoot) {
      return { _tag: "CollectionRenamed", fromId: basename(source), toId: basename(dest), path: dest };
    }
    // Moved out of (or into) the root: only one side is still a collection
    if (fromRoot) return collectionEvent("deleted", source);
    if (toRoot) return collectionEvent("created", dest);
    return { _tag: "Ignored", reason: "not-in-library" };
  }

  const fromRoot = isChapterPath(source, root);
  const toRoot = isChapterPath(dest, root);

  if (fromRoot && toRoot) {
    return {
      _tag: "ChapterRenamed",
      fromCollection: basename(dirname(source)),
      fromName: basename(source),
      collection: basename(dirname(dest)),
      name: basename(dest),
    };
  }
  if (fromRoot) return chapterEvent("deleted", source);
  if (toRoot) return chapterEvent("created", dest);
  return { _tag: "Ignored", reason: "not-in-library" };
}

/**
 * Classifies a raw notification relative to the library root.
 *
 * Only directories directly under the root (collections) and files directly
 * inside those (chapters) are relevant. Everything else, the root itself
 * included, is `Ignored`. Relative paths cannot be placed under the root and are
 * `Ignored` as ambiguous.
 */
export function classifyNotification(notification: RawNotification, libraryPath: string): LibraryEvent {
  const root = resolve(libraryPath);
  const { kind, isDirectory, sourcePath, destPath } = notification;

  if (!isAbsolute(sourcePath)) {
    return { _tag: "Ignored", reason: "ambiguous" };
  }
  const source = resolve(sourcePath);

  if (kind === "moved") {
    if (destPath === undefined || !isAbsolute(destPath)) {
      return { _tag: "Ignored", reason: "ambiguous" };
    }
    return classifyMove(source, resolve(destPath), isDirectory, root);
  }

  if (isDirectory) {
    return isCollectionPath(source, root)
      ? collectionEvent(kind, source)
      : { _tag: "Ignored", reason: "not-in-library" };
  }

  return isChapterPath(source, root)
    ? chapterEvent(kind, source)
    : { _tag: "Ignored", reason: "not-in-library" };
}

// Adapt raw notification to a relevant LibraryEvent, logging the ones dropped
export const adaptNotification = (
  raw: RawNotification,
): Effect.Effect<RelevantLibraryEvent | null, never, ConfigService | LoggerService> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const logger = yield* LoggerService;

    const event = classifyNotification(raw, config.libraryPath);
    if (event._tag === "Ignored") {
      yield* logger.debug("EventAdapter", "Ignored notification", {
        event_type: "notification_ignored",
        reason: event.reason,
        source_path: raw.sourcePath,
        dest_path: raw.destPath,
      });
      return null;
    }

    return event;
  });
