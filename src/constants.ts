export const DEFAULT_CHAPTER_EXTENSION = ".cbz";
export const DEFAULT_STORE_PATH = "./library.json";

export const SAVE_THROTTLE_MS = 500;
export const UPDATE_THROTTLE_MS = 500;
export const POLL_INTERVAL_MS = 1000;
export const MOVE_WINDOW_MS = 250;

export const TMP_SUFFIX = ".tmp";
