import { ResolutionRules, parseRules } from "./ancillary";
import { BackoffPolicy, backoffDelay } from "./backoff";
import { ClockAnchor } from "./clock";
import { DueQueue } from "./dueQueue";
import {
  OverrideConflictError,
  ResolutionError,
  UnauthorizedSignerError,
  classifyError,
  errorMessage,
} from "./errors";
import { bundleFromAttempt, describeOutcome, syntheticBundle } from "./evidence";
import { LifecycleStore } from "./lifecycle";
import { SettlementResult } from "./settlement";
import { Attempt, EvidenceBundle, OperatorNotifier, Outcome, ResolutionRequest } from "./types";
import { ResultVerifier } from "./verifier";

export interface AttemptRunner {
  run(request: ResolutionRequest, rules: ResolutionRules, startedAt: number): Promise<Attempt>;
  /** Drops whatever the runner remembers about a request that will not run again. */
  forget(requestId: string): void;
}

export interface Settler {
  submit(requestId: string, price: bigint, evidenceHash: string): Promise<SettlementResult>;
}

export interface SchedulerOptions {
  maxAttempts: number;
  backoff: BackoffPolicy;
  workerPoolSize: number;
  defaultOutcome: Outcome;
  submitDefaultOutcome: boolean;
  tickIntervalMs: number;
  random?: () => number;
}

export type Override = { action: "retry" } | { action: "outcome"; outcome: Outcome; reason?: string };

/**
 * The coordinating loop. Owns the due-time queue and the set of in-flight
 * tasks; tasks report back here and only this class asks the store for
 * transitions. Every time comparison goes through the clock anchor.
 */
export class ResolutionScheduler {
  private readonly queue = new DueQueue();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly background = new Map<string, Promise<void>>();
  private readonly random: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private staleWarned = false;

  constructor(
    private readonly store: LifecycleStore,
    private readonly clock: ClockAnchor,
    private readonly executor: AttemptRunner,
    private readonly verifier: ResultVerifier,
    private readonly settlement: Settler,
    private readonly notifier: OperatorNotifier,
    private readonly options: SchedulerOptions
  ) {
    this.random = options.random ?? Math.random;
    // finalization can come from the watcher as well as from this loop
    store.onTransition((event) => {
      if (event.to !== "finalized") return;
      this.queue.remove(event.requestId);
      this.executor.forget(event.requestId);
    });
  }

  start(): void {
    if (this.timer) return;
    const recovered = this.store.recoverInterrupted(this.clock.now().time);
    if (recovered > 0) console.warn(`[Scheduler] ${recovered} request(s) were interrupted by a restart`);
    for (const request of this.store.listActive()) this.track(request);
    this.timer = setInterval(() => this.tick(), this.options.tickIntervalMs);
    console.log(`[Scheduler] Started with ${this.queue.size} active request(s)`);
  }

  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    await this.idle();
  }

  /** Resolves once no attempt or background settlement is running. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0 || this.background.size > 0) {
      await Promise.all([...this.inFlight.values(), ...this.background.values()]);
    }
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  isInFlight(id: string): boolean {
    return this.inFlight.has(id);
  }

  /** Puts a request on the queue at the next moment it needs attention. */
  track(request: ResolutionRequest): void {
    if (request.state === "finalized") {
      this.queue.remove(request.id);
      return;
    }
    const eligibleAt = Math.max(request.earliestResolveTime, request.nextAttemptAt ?? 0);
    this.queue.schedule(request.id, Math.min(eligibleAt, request.deadline));
  }

  /** One pass over everything due. Returns the number of attempts dispatched. */
  tick(): number {
    const reading = this.clock.now();
    if (reading.stale) {
      if (!this.staleWarned) {
        console.warn(`[Scheduler] Clock anchor is stale (age ${reading.ageMs}ms), holding all dispatch`);
        this.staleWarned = true;
      }
      return 0;
    }
    this.staleWarned = false;
    const now = reading.time;

    let dispatched = 0;
    const waitingForSlot: string[] = [];
    for (const id of this.queue.takeDue(now)) {
      const request = this.store.get(id);
      if (!request || request.state === "finalized" || this.inFlight.has(id)) continue;

      if (now >= request.deadline) {
        this.defaultRequest(request, now);
        continue;
      }
      if (request.operatorHold || request.attemptCount >= this.options.maxAttempts) {
        // nothing more to try automatically; wake up at the deadline to default
        this.queue.schedule(id, request.deadline);
        continue;
      }
      const eligibleAt = Math.max(request.earliestResolveTime, request.nextAttemptAt ?? 0);
      if (now < eligibleAt) {
        this.queue.schedule(id, Math.min(eligibleAt, request.deadline));
        continue;
      }
      if (this.inFlight.size >= this.options.workerPoolSize) {
        waitingForSlot.push(id);
        continue;
      }
      if (this.dispatch(request, now)) dispatched++;
    }
    for (const id of waitingForSlot) this.queue.schedule(id, now);
    return dispatched;
  }

  async applyOverride(id: string, override: Override): Promise<ResolutionRequest> {
    const request = this.store.require(id);
    if (request.state === "finalized") {
      throw new OverrideConflictError(`Request ${id} is already finalized (${request.finalReason})`);
    }
    if (request.state === "resolving" || this.inFlight.has(id)) {
      throw new OverrideConflictError(`Request ${id} has an attempt in flight`);
    }
    const now = this.clock.now().time;

    if (override.action === "retry") {
      const updated = request.state === "waiting_retry" ? this.store.releaseHold(id, now) : request;
      this.queue.schedule(id, now);
      console.log(`[Scheduler] ${id} retry forced by operator`);
      return updated;
    }

    const settlement = this.store.getSettlement(id);
    if (settlement?.confirmationState === "pending") {
      throw new OverrideConflictError(`Request ${id} has settlement ${settlement.txHash} awaiting confirmation`);
    }
    const unsettled = this.store.getUnsettledEvidence(id);
    if (unsettled) this.store.markEvidenceSpent(id, unsettled.bundle.sequence);

    const bundle = syntheticBundle(
      id,
      "operator",
      override.outcome,
      this.store.nextEvidenceSequence(id),
      this.clock.now().anchor,
      override.reason ?? "operator-supplied outcome",
      now
    );
    this.store.putEvidence(bundle);
    if (request.state === "waiting_retry") this.store.releaseHold(id, now);
    console.log(`[Scheduler] ${id} operator outcome ${describeOutcome(override.outcome)} queued for settlement`);
    // settled through the same clock, eligibility and pool gates as any attempt
    this.queue.schedule(id, now);
    this.tick();
    return this.store.require(id);
  }

  private dispatch(request: ResolutionRequest, now: number): boolean {
    let started: ResolutionRequest;
    try {
      started = this.store.beginAttempt(request.id, now);
    } catch (e) {
      console.error(`[Scheduler] ${request.id} could not start an attempt: ${errorMessage(e)}`);
      return false;
    }
    const task = this.runAttempt(started, now)
      .catch((e) => console.error(`[Scheduler] ${request.id} attempt bookkeeping failed: ${errorMessage(e)}`))
      .finally(() => {
        this.inFlight.delete(request.id);
        const latest = this.store.get(request.id);
        if (latest) this.track(latest);
      });
    this.inFlight.set(request.id, task);
    return true;
  }

  private isFinalized(id: string): boolean {
    return this.store.get(id)?.state === "finalized";
  }

  private async runAttempt(request: ResolutionRequest, startedAt: number): Promise<void> {
    const id = request.id;
    let bundle: EvidenceBundle | null = null;
    try {
      let evidenceHash: string;
      const unsettled = this.store.getUnsettledEvidence(id);
      if (unsettled) {
        // an earlier attempt was accepted; only the settlement is left to do
        bundle = unsettled.bundle;
        evidenceHash = unsettled.evidenceHash;
        console.log(`[Scheduler] ${id} resuming settlement of evidence #${bundle.sequence}`);
      } else {
        const rules = parseRules(request.ancillaryData);
        const attempt = await this.executor.run(request, rules, startedAt);
        if (this.isFinalized(id)) {
          console.log(`[Scheduler] ${id} finalized while executing, discarding attempt`);
          return;
        }
        const verdict = this.verifier.verify(attempt, rules);
        if (!verdict.accepted) {
          throw new ResolutionError(`Verifier rejected output: ${verdict.reason}`, "rejection");
        }
        const reading = this.clock.now();
        const sequence = this.store.nextEvidenceSequence(id);
        bundle = bundleFromAttempt(attempt, verdict.outcome, sequence, reading.anchor, reading.time);
        evidenceHash = this.store.putEvidence(bundle);
        console.log(`[Scheduler] ${id} accepted ${describeOutcome(verdict.outcome)}, evidence ${evidenceHash}`);
      }

      if (this.isFinalized(id)) {
        console.log(`[Scheduler] ${id} finalized before settlement, not submitting`);
        return;
      }
      const result = await this.settlement.submit(id, BigInt(bundle.price), evidenceHash);
      const now = this.clock.now().time;

      if (result.status === "confirmed") {
        this.store.attachSettlementTx(id, bundle.sequence, result.record.txHash);
      }
      if (this.isFinalized(id)) return;
      this.store.finalize(id, result.status === "confirmed" ? "settled" : "external", now);
      console.log(`[Scheduler] ${id} finalized (${result.status === "confirmed" ? "settled" : "external"})`);
    } catch (e) {
      this.handleFailure(id, classifyError(e), bundle);
    }
  }

  private handleFailure(id: string, error: ResolutionError, bundle: EvidenceBundle | null): void {
    const current = this.store.get(id);
    if (!current || current.state !== "resolving") {
      console.log(`[Scheduler] ${id} is ${current?.state ?? "gone"}, dropping failure: ${error.message}`);
      return;
    }

    if (bundle && error.kind === "permanent") {
      // the accepted evidence cannot be settled; the next attempt starts over
      this.store.markEvidenceSpent(id, bundle.sequence);
    }

    const now = this.clock.now().time;
    const hold = error instanceof UnauthorizedSignerError || error.kind === "programming";
    const wait = backoffDelay(current.failureCount + 1, this.options.backoff, this.random);
    const updated = this.store.recordFailure(
      id,
      { error: error.message, consumesAttempt: error.consumesAttempt, nextAttemptAt: now + wait, hold },
      now
    );

    const log = error.kind === "transient" || error.kind === "rejection" ? console.warn : console.error;
    log(
      `[Scheduler] ${id} ${error.kind} failure (${updated.attemptCount}/${this.options.maxAttempts} attempts): ${error.message}; next try in ${wait}ms`
    );

    if (hold) {
      this.alert(`Request ${id} needs operator attention: ${error.message}`);
    } else if (updated.attemptCount >= this.options.maxAttempts) {
      this.alert(
        `Request ${id} exhausted ${updated.attemptCount} attempts (last error: ${error.message}). It will default at ${new Date(updated.deadline).toISOString()} unless overridden.`
      );
    }
  }

  private defaultRequest(request: ResolutionRequest, now: number): void {
    const id = request.id;
    const outcome = this.options.defaultOutcome;
    try {
      const bundle = syntheticBundle(
        id,
        "default",
        outcome,
        this.store.nextEvidenceSequence(id),
        this.clock.now().anchor,
        `deadline passed after ${request.attemptCount} attempt(s)${request.lastError ? `; last error: ${request.lastError}` : ""}`,
        now
      );
      const evidenceHash = this.store.putEvidence(bundle);
      this.store.finalize(id, "defaulted", now, request.lastError ?? "deadline reached");
      console.warn(`[Scheduler] ${id} defaulted to ${describeOutcome(outcome)} at deadline`);

      const existing = this.store.getSettlement(id);
      if (!this.options.submitDefaultOutcome) return;
      if (existing && existing.confirmationState !== "failed") {
        console.warn(`[Scheduler] ${id} already has settlement ${existing.txHash}, not submitting the default`);
        return;
      }
      const sequence = bundle.sequence;
      const task = this.settlement
        .submit(id, BigInt(bundle.price), evidenceHash)
        .then((result) => {
          if (result.status === "confirmed") this.store.attachSettlementTx(id, sequence, result.record.txHash);
          console.log(`[Scheduler] ${id} default settlement ${result.status}`);
        })
        .catch((e) => {
          console.error(`[Scheduler] ${id} default settlement failed: ${errorMessage(e)}`);
          this.alert(`Default settlement for ${id} failed: ${errorMessage(e)}`);
        })
        .finally(() => this.background.delete(id));
      this.background.set(id, task);
    } catch (e) {
      console.error(`[Scheduler] ${id} could not be defaulted: ${errorMessage(e)}`);
      this.alert(`Request ${id} could not be defaulted: ${errorMessage(e)}`);
    }
  }

  private alert(message: string): void {
    this.notifier.alert(message).catch((e) => console.error(`[Scheduler] Alert delivery failed: ${errorMessage(e)}`));
  }
}
