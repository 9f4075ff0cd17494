import { Effect, Option, Queue } from "effect";
import { adaptNotification } from "./adapters/event-adapter.ts";
import { handleEvent } from "./router.ts";
import { LoggerService } from "./services.ts";
import type { RawNotification, RelevantLibraryEvent } from "./types.ts";

// None marks the end of the stream
export type NotificationQueue = Queue.Queue<Option.Option<RawNotification>>;

// Generate unique event ID for tracing
function generateEventId(event: RelevantLibraryEvent): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 7);
  return `${event._tag}:${timestamp}:${random}`;
}

function getEventCollection(event: RelevantLibraryEvent): string {
  switch (event._tag) {
    case "CollectionCreated":
    case "CollectionRemoved":
      return event.id;
    case "CollectionRenamed":
      return event.toId;
    case "ChapterAdded":
    case "ChapterRemoved":
    case "ChapterRenamed":
      return event.collection;
  }
}

// Handle one notification; failures are logged and never escape
export const processNotification = (raw: RawNotification) =>
  Effect.gen(function* () {
    const logger = yield* LoggerService;

    yield* logger.debug("Consumer", "Notification received", {
      event_type: "notification_received",
      source_path: raw.sourcePath,
      dest_path: raw.destPath,
    });

    const event = yield* adaptNotification(raw);
    if (event === null) return;

    const eventId = generateEventId(event);
    const collection = getEventCollection(event);
    const startTime = Date.now();

    yield* logger.debug("Consumer", "Handler started", {
      event_type: "handler_start",
      event_id: eventId,
      event_tag: event._tag,
      collection,
    });

    yield* handleEvent(event).pipe(
      Effect.zipRight(
        Effect.suspend(() =>
          logger.debug("Consumer", "Handler completed", {
            event_type: "handler_complete",
            event_id: eventId,
            event_tag: event._tag,
            collection,
            duration_ms: Date.now() - startTime,
          }),
        ),
      ),
      Effect.catchAll((error) =>
        logger.error("Consumer", "Handler failed", error, {
          event_type: "handler_error",
          event_id: eventId,
          event_tag: event._tag,
          collection,
          duration_ms: Date.now() - startTime,
        }),
      ),
    );
  });

// Event loop - runs until the end marker is taken
export const processNotifications = (queue: NotificationQueue) =>
  Effect.gen(function* () {
    const logger = yield* LoggerService;

    yield* logger.debug("Consumer", "Started processing notifications");

    while (true) {
      const next = yield* Queue.take(queue);
      if (Option.isNone(next)) break;
      yield* processNotification(next.value);
    }

    yield* logger.debug("Consumer", "Stopped processing notifications");
  });
