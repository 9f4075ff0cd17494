import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { Effect, Either, ManagedRuntime } from "effect";
import { LibraryStore } from "../../../src/effect/services.ts";
import { initialSync } from "../../../src/initial-sync.ts";
import { encodeStoreFile } from "../../../src/store/persistence.ts";
import { makeCollectionRecord } from "../../../src/types.ts";
import { InvalidRootError } from "../../../src/utils/errors.ts";
import {
  createMemoryFileSystem,
  createMockLogger,
  makeMemoryFileSystemService,
  makeStoreLayer,
  makeTestConfig,
  type MemoryFileSystem,
  type StoreRuntime,
} from "../../helpers/layers.ts";

const STORE_FILE = "/state/library.json";

describe("initialSync", () => {
  const logger = createMockLogger();
  let memory: MemoryFileSystem;
  let runtime: StoreRuntime;

  const open = () => {
    runtime = ManagedRuntime.make(
      makeStoreLayer(makeTestConfig({ libraryPath: "/library", storePath: STORE_FILE }), logger, makeMemoryFileSystemService(memory)),
    );
  };

  beforeEach(() => {
    logger.reset();
    memory = createMemoryFileSystem();
  });

  afterEach(async () => {
    await runtime.dispose();
  });

  test("indexes every first-level directory", async () => {
    memory.directories.set("/library", [
      { name: "Foo", isDirectory: true },
      { name: "Bar", isDirectory: true },
      { name: "stray.cbz", isDirectory: false },
    ]);
    memory.directories.set("/library/Foo", [{ name: "f1.cbz", isDirectory: false }]);
    memory.directories.set("/library/Bar", []);
    open();

    const result = await runtime.runPromise(initialSync);
    const snapshot = await runtime.runPromise(Effect.flatMap(LibraryStore, (store) => store.snapshot()));

    expect(result).toEqual({ scanned: 2, created: 2, updated: 0, removed: 0 });
    expect(Object.keys(snapshot).sort()).toEqual(["Bar", "Foo"]);
    expect(snapshot.Foo?.chapterFiles).toEqual(["f1.cbz"]);
  });

  test("refreshes known collections and drops vanished ones", async () => {
    const stored = (id: string, chapterFiles: string[]) =>
      makeCollectionRecord({
        id,
        path: `/library/${id}`,
        createdAt: "2026-01-01T00:00:00.000Z",
        lastUpdated: "2026-01-01T00:00:00.000Z",
        chapterFiles,
      });
    memory.files.set(STORE_FILE, encodeStoreFile([stored("Foo", ["old.cbz"]), stored("Gone", ["g.cbz"])]));
    memory.directories.set("/library", [{ name: "Foo", isDirectory: true }]);
    memory.directories.set("/library/Foo", [{ name: "new.cbz", isDirectory: false }]);
    open();

    const result = await runtime.runPromise(initialSync);
    const foo = await runtime.runPromise(Effect.flatMap(LibraryStore, (store) => store.get("Foo")));

    expect(result).toEqual({ scanned: 1, created: 0, updated: 1, removed: 1 });
    expect(foo?.chapterFiles).toEqual(["new.cbz"]);
    expect(foo?.createdAt).toBe("2026-01-01T00:00:00.000Z");
  });

  test("a missing root fails with InvalidRootError", async () => {
    open();

    const result = await runtime.runPromise(Effect.either(initialSync));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(InvalidRootError);
      expect(result.left.message).toBe("Invalid library root /library: does not exist");
    }
  });

  test("logs completion with the counts", async () => {
    memory.directories.set("/library", []);
    open();

    await runtime.runPromise(initialSync);
    const completed = logger.infoCalls.find((c) => c.tag === "InitialSync" && c.msg.startsWith("Completed in"));

    expect(completed?.ctx).toEqual({ scanned: 0, created: 0, updated: 0, removed: 0 });
  });
});
