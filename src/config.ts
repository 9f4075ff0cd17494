import { resolve } from "node:path";
import {
  DEFAULT_CHAPTER_EXTENSION,
  DEFAULT_STORE_PATH,
  POLL_INTERVAL_MS,
  SAVE_THROTTLE_MS,
  UPDATE_THROTTLE_MS,
} from "./constants.ts";
import { ConfigError } from "./utils/errors.ts";

export interface Config {
  /** Absolute path of the watched root; each subdirectory is a collection. */
  libraryPath: string;
  /** Absolute path of the persisted JSON snapshot. */
  storePath: string;
  chapterExtension: string;
  saveThrottleMs: number;
  updateThrottleMs: number;
  usePolling: boolean;
  pollIntervalMs: number;
}

type Env = Record<string, string | undefined>;

function parseDuration(name: string, value: string | undefined, fallback: number, problems: string[]): number {
  if (value === undefined || value === "") return fallback;
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    problems.push(`${name} must be a positive integer (got "${value}")`);
    return fallback;
  }
  return ms;
}

export function loadConfig(env: Env = process.env): Config {
  const problems: string[] = [];

  const libraryPath = env.LIBRARY_PATH;
  if (!libraryPath) {
    problems.push("LIBRARY_PATH is required");
  }

  const chapterExtension = env.CHAPTER_EXTENSION ?? DEFAULT_CHAPTER_EXTENSION;
  if (chapterExtension.trim() === "") {
    problems.push("CHAPTER_EXTENSION must not be empty");
  }

  const saveThrottleMs = parseDuration("SAVE_THROTTLE_MS", env.SAVE_THROTTLE_MS, SAVE_THROTTLE_MS, problems);
  const updateThrottleMs = parseDuration("UPDATE_THROTTLE_MS", env.UPDATE_THROTTLE_MS, UPDATE_THROTTLE_MS, problems);
  const pollIntervalMs = parseDuration("POLL_INTERVAL_MS", env.POLL_INTERVAL_MS, POLL_INTERVAL_MS, problems);

  if (problems.length > 0 || !libraryPath) {
    throw new ConfigError(problems);
  }

  return {
    libraryPath: resolve(libraryPath),
    storePath: resolve(env.STORE_PATH || DEFAULT_STORE_PATH),
    chapterExtension,
    saveThrottleMs,
    updateThrottleMs,
    usePolling: env.USE_POLLING === "true",
    pollIntervalMs,
  };
}
