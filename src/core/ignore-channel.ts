import path from "path";
import { EventEmitter } from "events";
import { logDebug, logWarn } from "@cli/utils/logger";

export type OverflowPolicy = "drop-newest" | "drop-oldest";

export interface IgnoreChannelOptions {
  /** Maximum number of undrained paths kept in the buffer. */
  capacity?: number;
  overflow?: OverflowPolicy;
}

/**
 * Fire-and-forget channel through which pipelines tell a file watcher which
 * paths they write to, so the watcher does not treat build output as a
 * source change.
 *
 * `send` never blocks and never throws. Each path is delivered one way: to
 * the `"ignore"` listeners, on a later turn of the event loop, when any are
 * attached; otherwise into the buffer until `drain()` takes it. When the
 * buffer is full the overflow policy decides which path is lost.
 */
export class IgnoreChannel extends EventEmitter {
  readonly capacity: number;
  readonly overflow: OverflowPolicy;
  private buffer: string[] = [];
  private closed = false;
  private droppedCount = 0;

  constructor(options: IgnoreChannelOptions = {}) {
    super();
    this.capacity = Math.max(1, options.capacity ?? 64);
    this.overflow = options.overflow ?? "drop-newest";
  }

  send(filePath: string): boolean {
    if (this.closed) {
      this.droppedCount += 1;
      return false;
    }
    const abs = path.resolve(filePath);

    if (this.listenerCount("ignore") > 0) {
      setImmediate(() => {
        try {
          this.emit("ignore", abs);
        } catch (err) {
          logWarn(`ignore channel listener failed for ${abs}: ${String(err)}`);
        }
      });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.droppedCount += 1;
      if (this.overflow === "drop-newest") {
        logDebug(`ignore channel full, dropped ${abs}`);
        return false;
      }
      const evicted = this.buffer.shift();
      logDebug(`ignore channel full, evicted ${evicted ?? "<none>"}`);
    }
    this.buffer.push(abs);
    return true;
  }

  /** Take every buffered path, oldest first. */
  drain(): string[] {
    const paths = this.buffer;
    this.buffer = [];
    return paths;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get size(): number {
    return this.buffer.length;
  }

  close() {
    this.closed = true;
    this.buffer = [];
    this.removeAllListeners();
  }
}
