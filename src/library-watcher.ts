import { Effect, Fiber, Option, Queue } from "effect";
import { processNotifications, type NotificationQueue } from "./effect/consumer.ts";
import { ConfigService, FileSystemService, LibraryStore, LoggerService } from "./effect/services.ts";
import type { RawNotification } from "./effect/types.ts";
import type { NotificationSource, Subscription } from "./sources/types.ts";
import { hasErrorCode, InvalidRootError } from "./utils/errors.ts";

export type WatcherState = "stopped" | "watching";

export interface LibraryWatcher {
  /** Validates the root and subscribes; a no-op while already watching. */
  readonly start: Effect.Effect<void, InvalidRootError>;
  /** Unsubscribes and waits for queued notifications to be applied. */
  readonly stop: Effect.Effect<void>;
  readonly state: () => WatcherState;
}

interface ActiveWatch {
  readonly queue: NotificationQueue;
  readonly consumer: Fiber.RuntimeFiber<void>;
  readonly subscription: Subscription;
}

/**
 * Binds a notification source to the library store. Notifications are queued
 * by the source's callback and applied one at a time by a single consumer
 * fiber, so events for the same path are handled in arrival order.
 */
export const makeLibraryWatcher = (source: NotificationSource) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const logger = yield* LoggerService;
    const fs = yield* FileSystemService;
    const context = yield* Effect.context<ConfigService | LibraryStore | LoggerService>();
    const transition = (yield* Effect.makeSemaphore(1)).withPermits(1);
    const root = config.libraryPath;

    let active: ActiveWatch | null = null;

    const validateRoot = fs.stat(root).pipe(
      Effect.mapError(
        (error) => new InvalidRootError(root, hasErrorCode(error, "ENOENT") ? "does not exist" : error.message, error),
      ),
      Effect.flatMap((stats) =>
        stats.isDirectory() ? Effect.void : Effect.fail(new InvalidRootError(root, "not a directory")),
      ),
    );

    const start = transition(
      Effect.gen(function* () {
        if (active) {
          yield* logger.info("Watcher", "Already watching", { root });
          return;
        }

        yield* validateRoot;

        const queue: NotificationQueue = yield* Queue.unbounded<Option.Option<RawNotification>>();
        const consumer = yield* Effect.forkDaemon(processNotifications(queue).pipe(Effect.provide(context)));

        const subscription = yield* Effect.tryPromise({
          try: () =>
            source.subscribe(root, (notification) => {
              Queue.unsafeOffer(queue, Option.some(notification));
            }),
          catch: (error) => new InvalidRootError(root, "subscription failed", error),
        }).pipe(Effect.tapError(() => Fiber.interrupt(consumer)));

        active = { queue, consumer, subscription };
        yield* logger.info("Watcher", "Watching", { root });
      }),
    );

    const stop = transition(
      Effect.gen(function* () {
        if (!active) {
          yield* logger.debug("Watcher", "Not watching", { root });
          return;
        }
        const { queue, consumer, subscription } = active;

        yield* Effect.tryPromise(() => subscription.close()).pipe(
          Effect.catchAll((error) => logger.error("Watcher", "Failed to close notification source", error, { root })),
        );

        // Drain whatever the source delivered before it closed
        yield* Queue.offer(queue, Option.none());
        yield* Fiber.join(consumer);
        yield* Queue.shutdown(queue);

        active = null;
        yield* logger.info("Watcher", "Stopped", { root });
      }),
    );

    const watcher: LibraryWatcher = {
      start,
      stop,
      state: () => (active ? "watching" : "stopped"),
    };
    return watcher;
  });
