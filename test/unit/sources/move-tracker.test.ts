import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import type { RawNotification } from "../../../src/effect/types.ts";
import { MoveTracker } from "../../../src/sources/chokidar-source.ts";

const WINDOW_MS = 250;

describe("MoveTracker", () => {
  let received: RawNotification[];
  let tracker: MoveTracker;

  beforeEach(() => {
    vi.useFakeTimers();
    received = [];
    tracker = new MoveTracker("/library", WINDOW_MS, (n) => received.push(n));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("a removal followed by an add of the same directory is one move", () => {
    tracker.remember("/library/Foo", { dev: 1, ino: 10 });

    tracker.fileRemoved("/library/Foo/c1.cbz");
    tracker.dirRemoved("/library/Foo");
    tracker.dirAdded("/library/Bar", { dev: 1, ino: 10 });
    tracker.fileAdded("/library/Bar/c1.cbz");
    vi.advanceTimersByTime(WINDOW_MS * 4);

    expect(received).toEqual([
      { kind: "moved", isDirectory: true, sourcePath: "/library/Foo", destPath: "/library/Bar" },
      { kind: "created", isDirectory: false, sourcePath: "/library/Bar/c1.cbz" },
    ]);
  });

  test("an add that arrives before the removal is paired too, and its contents follow the move", () => {
    tracker.remember("/library/Foo", { dev: 1, ino: 10 });

    tracker.dirAdded("/library/Bar", { dev: 1, ino: 10 });
    tracker.fileAdded("/library/Bar/c1.cbz");
    tracker.fileRemoved("/library/Foo/c1.cbz");
    expect(received).toEqual([]);

    tracker.dirRemoved("/library/Foo");
    vi.advanceTimersByTime(WINDOW_MS * 4);

    expect(received).toEqual([
      { kind: "moved", isDirectory: true, sourcePath: "/library/Foo", destPath: "/library/Bar" },
      { kind: "created", isDirectory: false, sourcePath: "/library/Bar/c1.cbz" },
    ]);
  });

  test("an unpaired removal is reported once the window passes", () => {
    tracker.remember("/library/Foo", { dev: 1, ino: 10 });

    tracker.dirRemoved("/library/Foo");
    vi.advanceTimersByTime(WINDOW_MS - 1);
    expect(received).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(received).toEqual([{ kind: "deleted", isDirectory: true, sourcePath: "/library/Foo" }]);
  });

  test("a different inode is a removal and a creation", () => {
    tracker.remember("/library/Foo", { dev: 1, ino: 10 });

    tracker.dirRemoved("/library/Foo");
    tracker.dirAdded("/library/Bar", { dev: 1, ino: 11 });
    vi.advanceTimersByTime(WINDOW_MS);

    expect(received).toEqual([
      { kind: "deleted", isDirectory: true, sourcePath: "/library/Foo" },
      { kind: "created", isDirectory: true, sourcePath: "/library/Bar" },
    ]);
  });

  test("a directory never seen is reported deleted at once", () => {
    tracker.dirRemoved("/library/Unknown");

    expect(received).toEqual([{ kind: "deleted", isDirectory: true, sourcePath: "/library/Unknown" }]);
  });

  test("directories below the collection level pass straight through", () => {
    tracker.dirAdded("/library/Foo/extras", { dev: 1, ino: 12 });

    expect(received).toEqual([{ kind: "created", isDirectory: true, sourcePath: "/library/Foo/extras" }]);
  });

  test("a chapter removed after its collection left is not reported", () => {
    tracker.remember("/library/Foo", { dev: 1, ino: 10 });
    tracker.dirRemoved("/library/Foo");
    tracker.dirAdded("/library/Bar", { dev: 1, ino: 10 });

    tracker.fileRemoved("/library/Foo/c1.cbz");
    vi.advanceTimersByTime(WINDOW_MS * 4);

    expect(received).toEqual([
      { kind: "moved", isDirectory: true, sourcePath: "/library/Foo", destPath: "/library/Bar" },
    ]);
  });

  test("flush releases everything still held", () => {
    tracker.remember("/library/Foo", { dev: 1, ino: 10 });
    tracker.fileRemoved("/library/Foo/c1.cbz");
    tracker.dirAdded("/library/Baz", { dev: 1, ino: 13 });

    tracker.flush();
    vi.advanceTimersByTime(WINDOW_MS * 4);

    expect(received).toEqual([
      { kind: "deleted", isDirectory: false, sourcePath: "/library/Foo/c1.cbz" },
      { kind: "created", isDirectory: true, sourcePath: "/library/Baz" },
    ]);
  });
});
