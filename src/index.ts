import { Cause, Effect, Exit, Fiber } from "effect";
import { loadConfig, type Config } from "./config.ts";
import { makeLiveLayer } from "./effect/layer.ts";
import { ConfigService, LoggerService } from "./effect/services.ts";
import { initialSync } from "./initial-sync.ts";
import { makeLibraryWatcher } from "./library-watcher.ts";
import { log } from "./logging/logger.ts";
import { createChokidarSource } from "./sources/chokidar-source.ts";
import { makeLibraryUpdater, makeLoggingListener } from "./updater.ts";

const program = Effect.gen(function* () {
  const config = yield* ConfigService;
  const logger = yield* LoggerService;

  yield* initialSync;

  const listener = yield* makeLoggingListener;
  const updater = yield* makeLibraryUpdater(listener, config.updateThrottleMs);
  const watcher = yield* makeLibraryWatcher(
    createChokidarSource({ usePolling: config.usePolling, interval: config.pollIntervalMs }),
  );

  yield* watcher.start;
  yield* Effect.addFinalizer(() =>
    watcher.stop.pipe(Effect.zipRight(updater.flush), Effect.zipRight(updater.close)),
  );

  yield* logger.info("Init", "Library index running", {
    root: config.libraryPath,
    store_path: config.storePath,
    polling: config.usePolling,
  });

  return yield* Effect.never;
});

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    log.error("Config", "Invalid configuration", error);
    process.exit(1);
  }
}

const config = readConfig();

const fiber = Effect.runFork(
  program.pipe(
    Effect.scoped,
    Effect.tapError((error) => Effect.sync(() => log.error("Init", "Startup failed", error))),
    Effect.provide(makeLiveLayer(config)),
  ),
);

fiber.addObserver((exit) => {
  process.exitCode = Exit.isFailure(exit) && !Cause.isInterruptedOnly(exit.cause) ? 1 : 0;
});

const shutdown = (signal: string): void => {
  log.info("Init", "Shutting down", { signal });
  Effect.runFork(Fiber.interrupt(fiber));
};

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
