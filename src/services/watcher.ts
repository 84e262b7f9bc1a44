import { EligibilityPolicy, deriveSchedule, parseRules } from "./ancillary";
import { errorMessage } from "./errors";
import { LifecycleStore } from "./lifecycle";
import { OracleSource, RequestView, ResolutionRequest } from "./types";

export type WatchEvent =
  | { type: "created" | "updated"; request: ResolutionRequest }
  | { type: "external"; requestId: string };

export interface WatcherOptions {
  policy: EligibilityPolicy;
  now: () => number;
}

export class RequestWatcher {
  private timer: ReturnType<typeof setInterval> | null = null;
  private polling = false;

  constructor(
    private readonly oracle: OracleSource,
    private readonly store: LifecycleStore,
    private readonly options: WatcherOptions
  ) {}

  /** Outstanding requests as currently listed on-chain. Each call starts a fresh listing. */
  async *poll(): AsyncGenerator<RequestView> {
    const views = await this.oracle.listOutstanding();
    for (const view of views) yield view;
  }

  /** Reconciles the store with one listing. Re-observing an unchanged request writes nothing. */
  async sync(): Promise<WatchEvent[]> {
    const events: WatchEvent[] = [];
    const seen = new Set<string>();
    const now = this.options.now();

    for await (const view of this.poll()) {
      seen.add(view.id);
      if (view.settled) {
        if (this.finalizeExternal(view.id, now)) events.push({ type: "external", requestId: view.id });
        continue;
      }
      const rules = parseRules(view.ancillaryData);
      const schedule = deriveSchedule(rules, view.timestamp * 1000, this.options.policy);
      const { change, request } = this.store.upsertObserved(view, schedule, now);
      if (change !== "unchanged") {
        console.log(
          `[Watcher] ${change} ${view.id} (eligible ${new Date(schedule.earliestResolveTime).toISOString()}, deadline ${new Date(schedule.deadline).toISOString()})`
        );
        events.push({ type: change, request });
      }
    }

    for (const request of this.store.listActive()) {
      if (seen.has(request.id)) continue;
      if (this.finalizeExternal(request.id, now)) events.push({ type: "external", requestId: request.id });
    }
    return events;
  }

  start(intervalMs: number, onEvents: (events: WatchEvent[]) => void): void {
    if (this.timer) return;
    const run = () => {
      if (this.polling) return;
      this.polling = true;
      this.sync()
        .then(onEvents)
        .catch((e) => console.warn(`[Watcher] Poll failed: ${errorMessage(e)}`))
        .finally(() => {
          this.polling = false;
        });
    };
    run();
    this.timer = setInterval(run, intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  private finalizeExternal(id: string, now: number): boolean {
    // our own transaction settled it; the settlement task records that outcome
    const own = this.store.getSettlement(id);
    if (own && own.confirmationState !== "failed") return false;
    const finalized = this.store.markExternal(id, now);
    if (finalized) console.log(`[Watcher] ${id} settled by another resolver`);
    return finalized;
  }
}
