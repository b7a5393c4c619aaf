import {
  closeSync,
  linkSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  statSync,
  unlinkSync,
  writeSync,
} from "fs";
import { dirname, join } from "path";
import { LOCK_STALE_MS, LockTimeoutError } from "@barctl/core";

export interface LockOptions {
  timeoutMs: number;
  pollMs: number;
  /** PID written to the owner marker. */
  pid?: number;
  /** Liveness check for the PID found in an existing marker. */
  isAlive?: (pid: number) => boolean;
  /** Age after which a marker is reclaimed whatever its PID. */
  staleMs?: number;
  /** Release on process exit and termination signals. */
  releaseOnExit?: boolean;
}

interface OwnerMarker {
  pid: number | null;
  mtimeMs: number;
}

export interface LockHandle {
  readonly path: string;
  readonly pid: number;
  release(): void;
}

export interface Lock {
  acquire(): Promise<LockHandle>;
}

/** Signals that release the lock, with their numbers for the 128+n exit code. */
const RELEASE_SIGNALS = [
  ["SIGHUP", 1],
  ["SIGINT", 2],
  ["SIGTERM", 15],
] as const;

export function lockPathFor(dir: string, programName: string): string {
  return join(dir, `${programName}.lock`);
}

export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive, owned by someone else
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Single-instance lock on a fixed path. The lock file itself is created if
 * absent and never removed; the holder is recorded in `<path>.owner`, which
 * is created with O_EXCL and carries the holder's PID.
 */
export class InstanceLock implements Lock {
  readonly ownerPath: string;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;

  constructor(
    readonly path: string,
    private readonly options: LockOptions
  ) {
    this.ownerPath = `${path}.owner`;
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isPidAlive;
  }

  async acquire(): Promise<LockHandle> {
    this.touchLockFile();
    const deadline = Date.now() + this.options.timeoutMs;

    for (;;) {
      if (this.tryClaim()) return this.createHandle();

      const marker = this.readMarker();
      if (marker && this.isStale(marker)) {
        console.warn(`[lock] Removing stale lock held by pid ${marker.pid ?? "unknown"}`);
        this.reclaim(marker);
        continue;
      }

      if (Date.now() >= deadline) {
        throw new LockTimeoutError(this.path, marker?.pid ?? null);
      }
      await sleep(this.options.pollMs);
    }
  }

  /** PID recorded in the owner marker, or null when free or unreadable. */
  readOwner(): number | null {
    try {
      const pid = parseInt(readFileSync(this.ownerPath, "utf-8").trim(), 10);
      return Number.isNaN(pid) ? null : pid;
    } catch {
      return null;
    }
  }

  private readMarker(path: string = this.ownerPath): OwnerMarker | null {
    try {
      const { mtimeMs } = statSync(path);
      const pid = parseInt(readFileSync(path, "utf-8").trim(), 10);
      return { pid: Number.isNaN(pid) ? null : pid, mtimeMs };
    } catch {
      return null;
    }
  }

  /** Dead holder, or a marker older than any real run (PIDs get reused). */
  private isStale(marker: OwnerMarker): boolean {
    if (Date.now() - marker.mtimeMs > (this.options.staleMs ?? LOCK_STALE_MS)) return true;
    return marker.pid !== null && marker.pid !== this.pid && !this.isAlive(marker.pid);
  }

  /**
   * Moves the marker aside before deleting it, so a fresh claim made by
   * another process in the meantime is put back instead of lost.
   */
  private reclaim(seen: OwnerMarker) {
    const aside = `${this.ownerPath}.${this.pid}.${Date.now()}`;
    try {
      renameSync(this.ownerPath, aside);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return;
      throw err;
    }

    const moved = this.readMarker(aside);
    if (moved && (moved.pid !== seen.pid || moved.mtimeMs !== seen.mtimeMs)) {
      try {
        linkSync(aside, this.ownerPath);
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
      }
    }
    unlinkSync(aside);
  }

  private touchLockFile() {
    mkdirSync(dirname(this.path), { recursive: true });
    closeSync(openSync(this.path, "a"));
  }

  private tryClaim(): boolean {
    let fd: number;
    try {
      fd = openSync(this.ownerPath, "wx");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "EEXIST") return false;
      throw err;
    }
    try {
      writeSync(fd, String(this.pid));
    } finally {
      closeSync(fd);
    }
    return true;
  }

  private removeOwnerIf(pid: number) {
    if (this.readOwner() !== pid) return;
    try {
      unlinkSync(this.ownerPath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }
  }

  private createHandle(): LockHandle {
    let released = false;
    const onExit = () => handle.release();
    const signalListeners = RELEASE_SIGNALS.map(([signal, number]) => ({
      signal,
      listener: () => {
        handle.release();
        process.exit(128 + number);
      },
    }));

    const handle: LockHandle = {
      path: this.path,
      pid: this.pid,
      release: () => {
        if (released) return;
        released = true;
        this.removeOwnerIf(this.pid);
        if (this.options.releaseOnExit) {
          process.removeListener("exit", onExit);
          for (const { signal, listener } of signalListeners) {
            process.removeListener(signal, listener);
          }
        }
      },
    };

    if (this.options.releaseOnExit) {
      process.once("exit", onExit);
      for (const { signal, listener } of signalListeners) {
        process.once(signal, listener);
      }
    }
    return handle;
  }
}

/** Scoped acquisition: the lock is held for the duration of `fn`. */
export async function withInstanceLock<T>(
  lock: Lock,
  fn: (handle: LockHandle) => Promise<T>
): Promise<T> {
  const handle = await lock.acquire();
  try {
    return await fn(handle);
  } finally {
    handle.release();
  }
}
