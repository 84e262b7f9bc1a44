import { ClockSyncError, errorMessage } from "./errors";
import { ClockProof, TimeSample, TimeSource } from "./types";

export interface ClockAnchorOptions {
  /** readings older than this are stale and gate nothing open */
  staleAfterMs: number;
  localNow?: () => number;
}

export interface ClockReading {
  time: number;
  ageMs: number;
  stale: boolean;
  anchor: ClockProof | null;
}

/**
 * Drift-corrected time. All scheduling compares against `localNow() + offset`,
 * where the offset comes from the last successful sync against the authority.
 */
export class ClockAnchor {
  private anchor: ClockProof | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly staleAfterMs: number;
  private readonly localNow: () => number;

  constructor(private readonly source: TimeSource, options: ClockAnchorOptions) {
    this.staleAfterMs = options.staleAfterMs;
    this.localNow = options.localNow ?? Date.now;
  }

  async sync(): Promise<ClockProof> {
    const before = this.localNow();
    let sample: TimeSample;
    try {
      sample = await this.source.fetchTime();
    } catch (e) {
      throw new ClockSyncError(`Time source unreachable: ${errorMessage(e)}`);
    }
    const after = this.localNow();
    // Assume the authority stamped its reply halfway through the round trip.
    const midpoint = before + (after - before) / 2;
    this.anchor = {
      time: sample.time,
      syncedAt: after,
      offset: sample.time - midpoint,
      proof: sample.proof,
    };
    return this.anchor;
  }

  now(): ClockReading {
    const local = this.localNow();
    if (!this.anchor) {
      return { time: local, ageMs: Number.POSITIVE_INFINITY, stale: true, anchor: null };
    }
    const ageMs = local - this.anchor.syncedAt;
    return {
      time: local + this.anchor.offset,
      ageMs,
      stale: ageMs > this.staleAfterMs,
      anchor: this.anchor,
    };
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sync().catch((e) =>
        console.warn(`[Clock] Sync failed, keeping previous offset: ${errorMessage(e)}`)
      );
    }, intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
