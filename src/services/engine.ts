import { ClockAnchor } from "./clock";
import { errorMessage } from "./errors";
import { hashEvidence } from "./evidence";
import { LifecycleStore } from "./lifecycle";
import { Override, ResolutionScheduler } from "./scheduler";
import { EvidenceBundle, RequestState, ResolutionRequest, SettlementRecord, TranscriptEntry } from "./types";
import { RequestWatcher, WatchEvent } from "./watcher";

export interface EngineIntervals {
  clockSyncIntervalMs: number;
  pollIntervalMs: number;
}

export interface RequestStatus {
  request: ResolutionRequest;
  inFlight: boolean;
  settlement: SettlementRecord | null;
  evidence: EvidenceBundle | null;
}

export interface EngineHealth {
  status: "ok" | "degraded";
  clock: { time: number; ageMs: number | null; stale: boolean };
  requests: Record<RequestState, number>;
  inFlight: number;
}

/** The surface the HTTP API and the bot talk to. */
export class ResolutionEngine {
  constructor(
    private readonly store: LifecycleStore,
    private readonly clock: ClockAnchor,
    private readonly watcher: RequestWatcher,
    private readonly scheduler: ResolutionScheduler,
    private readonly intervals: EngineIntervals
  ) {}

  async start(): Promise<void> {
    try {
      const anchor = await this.clock.sync();
      console.log(`[Clock] Synced, offset ${Math.round(anchor.offset)}ms`);
    } catch (e) {
      console.warn(`[Clock] Initial sync failed, dispatch held until a sync succeeds: ${errorMessage(e)}`);
    }
    this.clock.start(this.intervals.clockSyncIntervalMs);
    this.scheduler.start();
    this.watcher.start(this.intervals.pollIntervalMs, (events) => this.onWatchEvents(events));
  }

  async stop(): Promise<void> {
    this.watcher.stop();
    this.clock.stop();
    await this.scheduler.stop();
  }

  onWatchEvents(events: WatchEvent[]): void {
    for (const event of events) {
      if (event.type !== "external") this.scheduler.track(event.request);
    }
    this.scheduler.tick();
  }

  list(state?: RequestState): ResolutionRequest[] {
    return this.store.list(state);
  }

  status(id: string): RequestStatus | null {
    const request = this.store.get(id);
    if (!request) return null;
    return {
      request,
      inFlight: this.scheduler.isInFlight(id),
      settlement: this.store.getSettlement(id),
      evidence: this.store.getEvidence(id),
    };
  }

  /** Read-only audit view: every bundle written for the request with its hash. */
  evidence(id: string): Array<EvidenceBundle & { evidenceHash: string }> {
    this.store.require(id);
    return this.store.listEvidence(id).map((bundle) => ({ ...bundle, evidenceHash: hashEvidence(bundle) }));
  }

  transcripts(id: string): TranscriptEntry[] {
    this.store.require(id);
    return this.store.listTranscripts(id);
  }

  health(): EngineHealth {
    const reading = this.clock.now();
    return {
      status: reading.stale ? "degraded" : "ok",
      clock: {
        time: reading.time,
        ageMs: Number.isFinite(reading.ageMs) ? reading.ageMs : null,
        stale: reading.stale,
      },
      requests: this.store.countByState(),
      inFlight: this.scheduler.inFlightCount(),
    };
  }

  override(id: string, override: Override): Promise<ResolutionRequest> {
    return this.scheduler.applyOverride(id, override);
  }
}
