import chokidar from "chokidar";
import type { Stats } from "node:fs";
import { dirname, resolve } from "node:path";
import { MOVE_WINDOW_MS } from "../constants.ts";
import type { RawNotification } from "../effect/types.ts";
import { log } from "../logging/logger.ts";
import type { NotificationListener, NotificationSource } from "./types.ts";

export interface ChokidarSourceOptions {
  usePolling: boolean;
  interval: number;
  /** How long a collection add or removal waits for its other half. */
  moveWindowMs?: number;
}

type Timer = ReturnType<typeof setTimeout>;

interface HeldAdd {
  key: string;
  timer: Timer;
  // Notifications inside the directory, released after it
  children: RawNotification[];
}

interface HeldRemoval {
  key: string;
  timer: Timer;
}

// Enough of fs.Stats to tell one directory from another
export type FileIdentity = Pick<Stats, "dev" | "ino">;

const identityOf = (stats: FileIdentity): string => `${stats.dev}:${stats.ino}`;

/**
 * Turns a collection removal and a collection add that share an inode into one
 * `moved` notification. Each half is held for the window; an unpaired half is
 * released as the `deleted` or `created` it was.
 */
export class MoveTracker {
  private readonly root: string;
  private readonly identities = new Map<string, string>();
  private readonly heldAdds = new Map<string, HeldAdd>();
  private readonly heldRemovals = new Map<string, HeldRemoval>();
  private readonly heldFileRemovals = new Map<string, Timer>();

  constructor(
    root: string,
    private readonly windowMs: number,
    private readonly emit: NotificationListener,
  ) {
    this.root = resolve(root);
  }

  /** Records a collection's inode without reporting anything. */
  remember(path: string, stats: FileIdentity | undefined): void {
    if (stats && this.isCollection(path)) this.identities.set(path, identityOf(stats));
  }

  dirAdded(path: string, stats: FileIdentity | undefined): void {
    if (!stats || !this.isCollection(path)) {
      this.forward({ kind: "created", isDirectory: true, sourcePath: path });
      return;
    }

    const key = identityOf(stats);
    this.identities.set(path, key);

    const source = this.findHeld(this.heldRemovals, key, path);
    if (source !== undefined) {
      const removal = this.heldRemovals.get(source);
      if (removal) clearTimeout(removal.timer);
      this.heldRemovals.delete(source);
      log.debug("ChokidarSource", "Move detected", { source_path: source, dest_path: path });
      this.emit({ kind: "moved", isDirectory: true, sourcePath: source, destPath: path });
      return;
    }

    this.heldAdds.set(path, {
      key,
      children: [],
      timer: setTimeout(() => this.releaseAdd(path), this.windowMs),
    });
  }

  dirRemoved(path: string): void {
    // The directory's own removal covers its chapters
    for (const [file, timer] of this.heldFileRemovals) {
      if (dirname(file) === path) {
        clearTimeout(timer);
        this.heldFileRemovals.delete(file);
      }
    }

    const key = this.identities.get(path);
    this.identities.delete(path);
    if (key === undefined) {
      this.emit({ kind: "deleted", isDirectory: true, sourcePath: path });
      return;
    }

    const dest = this.findHeld(this.heldAdds, key, path);
    const add = dest === undefined ? undefined : this.heldAdds.get(dest);
    if (dest !== undefined && add) {
      clearTimeout(add.timer);
      this.heldAdds.delete(dest);
      log.debug("ChokidarSource", "Move detected", { source_path: path, dest_path: dest });
      this.emit({ kind: "moved", isDirectory: true, sourcePath: path, destPath: dest });
      for (const child of add.children) this.emit(child);
      return;
    }

    this.heldRemovals.set(path, {
      key,
      timer: setTimeout(() => {
        this.heldRemovals.delete(path);
        this.emit({ kind: "deleted", isDirectory: true, sourcePath: path });
      }, this.windowMs),
    });
  }

  fileAdded(path: string): void {
    this.forward({ kind: "created", isDirectory: false, sourcePath: path });
  }

  fileRemoved(path: string): void {
    // Gone with its collection, which reports it
    if (!this.identities.has(dirname(path))) return;
    this.heldFileRemovals.set(
      path,
      setTimeout(() => {
        this.heldFileRemovals.delete(path);
        this.emit({ kind: "deleted", isDirectory: false, sourcePath: path });
      }, this.windowMs),
    );
  }

  /** Releases everything still held, removals first. */
  flush(): void {
    for (const [path, timer] of this.heldFileRemovals) {
      clearTimeout(timer);
      this.emit({ kind: "deleted", isDirectory: false, sourcePath: path });
    }
    this.heldFileRemovals.clear();

    for (const [path, removal] of this.heldRemovals) {
      clearTimeout(removal.timer);
      this.emit({ kind: "deleted", isDirectory: true, sourcePath: path });
    }
    this.heldRemovals.clear();

    for (const path of [...this.heldAdds.keys()]) this.releaseAdd(path);
  }

  private releaseAdd(path: string): void {
    const add = this.heldAdds.get(path);
    if (!add) return;
    clearTimeout(add.timer);
    this.heldAdds.delete(path);
    this.emit({ kind: "created", isDirectory: true, sourcePath: path });
    for (const child of add.children) this.emit(child);
  }

  private forward(notification: RawNotification): void {
    const held = this.heldAdds.get(dirname(notification.sourcePath));
    if (held) held.children.push(notification);
    else this.emit(notification);
  }

  private findHeld(held: Map<string, { key: string }>, key: string, except: string): string | undefined {
    for (const [path, entry] of held) {
      if (entry.key === key && path !== except) return path;
    }
    return undefined;
  }

  private isCollection(path: string): boolean {
    const resolved = resolve(path);
    return resolved !== this.root && dirname(resolved) === this.root;
  }
}

/**
 * chokidar-backed notification source. Only the root's children and
 * grandchildren are watched. chokidar reports a rename as an unlink and an add;
 * for collections the two are paired back into a `moved` notification by inode,
 * so chapter removals and collection changes are delayed by the move window.
 */
export function createChokidarSource(options: ChokidarSourceOptions): NotificationSource {
  return {
    subscribe: (root, listener) =>
      new Promise((settle) => {
        const tracker = new MoveTracker(root, options.moveWindowMs ?? MOVE_WINDOW_MS, listener);
        let ready = false;

        // The initial scan only records inodes; existing entries are not reported
        const watcher = chokidar.watch(root, {
          ignoreInitial: false,
          alwaysStat: true,
          persistent: true,
          depth: 1,
          usePolling: options.usePolling,
          interval: options.interval,
        });

        watcher
          .on("addDir", (path, stats) => {
            if (ready) tracker.dirAdded(path, stats);
            else tracker.remember(path, stats);
          })
          .on("unlinkDir", (path) => {
            if (ready) tracker.dirRemoved(path);
          })
          .on("add", (path) => {
            if (ready) tracker.fileAdded(path);
          })
          .on("unlink", (path) => {
            if (ready) tracker.fileRemoved(path);
          })
          .on("error", (error) => log.error("ChokidarSource", "Watcher error", error, { root }));

        watcher.once("ready", () => {
          ready = true;
          log.debug("ChokidarSource", "Ready", { root, polling: options.usePolling });
          settle({
            close: async () => {
              await watcher.close();
              tracker.flush();
            },
          });
        });
      }),
  };
}
