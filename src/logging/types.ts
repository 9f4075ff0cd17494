export type LogLevel = "debug" | "info" | "warn" | "error";

export type EventType =
  | "notification_received"
  | "notification_ignored"
  | "handler_start"
  | "handler_complete"
  | "handler_error"
  | "flush_complete"
  | "flush_error"
  | "diff_dispatched";

export interface LogContext {
  // Event context
  event_id?: string;
  event_tag?: string;
  event_type?: EventType;
  reason?: string;

  // Path context
  path?: string;
  source_path?: string;
  dest_path?: string;
  root?: string;

  // Collection context
  collection?: string;
  from?: string;
  to?: string;
  chapter?: string;
  chapters?: number;
  outcome?: string;

  // Handler context
  duration_ms?: number;

  // Store context
  store_path?: string;
  collections?: number;

  // Sync context
  scanned?: number;
  created?: number;
  updated?: number;
  removed?: number;

  // Diff context
  added_collections?: string[];
  removed_collections?: string[];
  added_chapters?: string[];
  removed_chapters?: string[];

  // Error context
  error?: string;
  error_stack?: string;

  // Misc
  polling?: boolean;
  signal?: string;
}

export interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  tag: string;
  msg: string;
}
