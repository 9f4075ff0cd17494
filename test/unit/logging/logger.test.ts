import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { errorContext, log, setLogLevel } from "../../../src/logging/logger.ts";

describe("log", () => {
  const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
  const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-03T04:05:06.000Z"));
    stdout.mockClear();
    stderr.mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
    setLogLevel("error");
  });

  test("writes one JSON line per entry", () => {
    setLogLevel("info");

    log.info("LibraryStore", "Loaded", { store_path: "/state/library.json", collections: 3 });

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(stdout.mock.calls[0]?.[0]))).toEqual({
      ts: "2026-02-03T04:05:06.000Z",
      level: "info",
      tag: "LibraryStore",
      msg: "Loaded",
      store_path: "/state/library.json",
      collections: 3,
    });
  });

  test("warnings and errors go to stderr", () => {
    setLogLevel("debug");

    log.warn("InitialSync", "Failed to index collection", { collection: "Foo" });
    log.error("Consumer", "Handler failed", new Error("EACCES"));

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(2);
    expect(JSON.parse(String(stderr.mock.calls[1]?.[0])).error).toBe("EACCES");
  });

  test("entries below the current level are dropped", () => {
    setLogLevel("warn");

    log.debug("Watcher", "Not watching");
    log.info("Watcher", "Watching");

    expect(stdout).not.toHaveBeenCalled();
  });
});

describe("errorContext", () => {
  test("describes errors, strings and other values", () => {
    const error = new Error("disk full");

    expect(errorContext(error)).toEqual({ error: "disk full", error_stack: error.stack });
    expect(errorContext("timeout")).toEqual({ error: "timeout" });
    expect(errorContext({ code: 5 })).toEqual({ error: '{"code":5}' });
    expect(errorContext(undefined)).toEqual({});
  });
});
