import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ResolutionRules } from "../ancillary";
import { ClockAnchor } from "../clock";
import { ExecutionFailedError, OverrideConflictError, SandboxUnavailableError, TransientChainError } from "../errors";
import { LifecycleStore } from "../lifecycle";
import { AttemptRunner, ResolutionScheduler, SchedulerOptions } from "../scheduler";
import { SettlementSubmitter } from "../settlement";
import { Attempt, ResolutionRequest } from "../types";
import { ResultVerifier } from "../verifier";
import { FakeOracle, FakeTimeSource, RecordingNotifier, deferred, makeAttempt, makeView } from "./fakes";

const T = 1_700_000_000_000;
const BASE = T - 10_000;
const ONE = 10n ** 18n;

class ScriptedRunner implements AttemptRunner {
  calls: string[] = [];
  forgotten: string[] = [];

  constructor(public handler: (request: ResolutionRequest) => Promise<Attempt>) {}

  run(request: ResolutionRequest, _rules: ResolutionRules, _startedAt: number): Promise<Attempt> {
    this.calls.push(request.id);
    return this.handler(request);
  }

  forget(requestId: string): void {
    this.forgotten.push(requestId);
  }
}

describe("ResolutionScheduler", () => {
  let local: number;
  let timeSource: FakeTimeSource;
  let clock: ClockAnchor;
  let store: LifecycleStore;
  let oracle: FakeOracle;
  let runner: ScriptedRunner;
  let notifier: RecordingNotifier;
  let scheduler: ResolutionScheduler;

  const setTime = (time: number) => {
    local = time - BASE;
  };

  function build(options: Partial<SchedulerOptions> = {}, staleAfterMs = 1e12): void {
    clock = new ClockAnchor(timeSource, { staleAfterMs, localNow: () => local });
    scheduler = new ResolutionScheduler(
      store,
      clock,
      runner,
      new ResultVerifier(),
      new SettlementSubmitter(oracle, oracle, store, {
        signer: "0xsigner",
        txRetries: 0,
        txRetryDelayMs: 1,
        confirmationTimeoutMs: 200,
        confirmationPollMs: 5,
      }),
      notifier,
      {
        maxAttempts: 3,
        backoff: { baseMs: 1000, maxMs: 10_000 },
        workerPoolSize: 2,
        defaultOutcome: { kind: "binary", decision: "invalid" },
        submitDefaultOutcome: false,
        tickIntervalMs: 60_000,
        random: () => 0,
        ...options,
      }
    );
  }

  function observe(text: string, schedule = { earliestResolveTime: T, deadline: T + 3_600_000 }): string {
    const { request } = store.upsertObserved(makeView(text, 1_700_000_000), schedule, 0);
    scheduler.track(request);
    return request.id;
  }

  beforeEach(async () => {
    local = 0;
    timeSource = new FakeTimeSource(BASE);
    store = new LifecycleStore();
    oracle = new FakeOracle();
    runner = new ScriptedRunner(async (request) => makeAttempt(request.id, { decision: true }));
    notifier = new RecordingNotifier();
    build();
    await clock.sync();
  });

  afterEach(async () => {
    await scheduler.stop();
    store.close();
  });

  it("does not dispatch before the eligibility time and settles right after it", async () => {
    const id = observe("Will it rain?");

    setTime(T - 1000);
    expect(scheduler.tick()).toBe(0);
    expect(runner.calls).toEqual([]);

    setTime(T + 1000);
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();

    expect(store.require(id)).toMatchObject({ state: "finalized", finalReason: "settled", attemptCount: 0 });
    expect(oracle.submissions).toHaveLength(1);
    expect(oracle.submissions[0].price).toBe(ONE);
    expect(store.getEvidence(id)?.settlementTxHash).toBe("0xtx1");
    expect(store.getSettlement(id)?.confirmationState).toBe("confirmed");
  });

  it("holds all dispatch while the clock is stale", async () => {
    build({}, 1000);
    await clock.sync();
    observe("Will it rain?");

    setTime(T + 1000);
    expect(clock.now().stale).toBe(true);
    expect(scheduler.tick()).toBe(0);

    timeSource.time = T + 1000;
    await clock.sync();
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();
  });

  it("defaults a request whose deadline falls inside its backoff", async () => {
    runner.handler = async () => {
      throw new SandboxUnavailableError("sandbox down");
    };
    const id = observe("Will it rain?", { earliestResolveTime: T, deadline: T + 300 });

    setTime(T);
    scheduler.tick();
    await scheduler.idle();
    const waiting = store.require(id);
    expect(waiting.state).toBe("waiting_retry");
    expect(waiting.nextAttemptAt).toBe(T + 500);

    setTime(T + 400);
    expect(scheduler.tick()).toBe(0);
    expect(runner.calls).toHaveLength(1);
    expect(store.require(id)).toMatchObject({
      state: "finalized",
      finalReason: "defaulted",
      lastError: "sandbox down",
    });
    const bundle = store.getEvidence(id);
    expect(bundle?.codeSource).toBe("default");
    expect(bundle?.outcome).toEqual({ kind: "binary", decision: "invalid" });
    expect(oracle.submitCalls).toBe(0);
  });

  it("defaults a request that was never attempted", () => {
    const id = observe("Will it rain?", { earliestResolveTime: T, deadline: T + 100 });

    setTime(T + 200);
    scheduler.tick();

    expect(store.require(id)).toMatchObject({ finalReason: "defaulted", lastError: "deadline reached" });
    expect(runner.calls).toEqual([]);
  });

  it("submits the default outcome when configured to", async () => {
    build({ submitDefaultOutcome: true });
    await clock.sync();
    const id = observe("Will it rain?", { earliestResolveTime: T, deadline: T + 100 });

    setTime(T + 200);
    scheduler.tick();
    await scheduler.idle();

    expect(oracle.submissions.map((s) => s.price)).toEqual([ONE / 2n]);
    expect(store.require(id).finalReason).toBe("defaulted");
    expect(store.getEvidence(id)?.settlementTxHash).toBe("0xtx1");
  });

  it("finalizes as external when another resolver settles during execution", async () => {
    const gate = deferred<void>();
    runner.handler = async (request) => {
      await gate.promise;
      return makeAttempt(request.id, { decision: true });
    };
    const id = observe("Will it rain?");

    setTime(T);
    scheduler.tick();
    oracle.settled.add(id);
    gate.resolve();
    await scheduler.idle();

    expect(store.require(id)).toMatchObject({ state: "finalized", finalReason: "external" });
    expect(oracle.submitCalls).toBe(0);
  });

  it("discards an attempt for a request finalized while it ran", async () => {
    const gate = deferred<void>();
    runner.handler = async (request) => {
      await gate.promise;
      return makeAttempt(request.id, { decision: true });
    };
    const id = observe("Will it rain?");

    setTime(T);
    scheduler.tick();
    store.markExternal(id, T);
    gate.resolve();
    await scheduler.idle();

    expect(store.listEvidence(id)).toEqual([]);
    expect(oracle.submitCalls).toBe(0);
  });

  it("never runs more attempts than the pool allows", async () => {
    const gate = deferred<void>();
    let running = 0;
    let peak = 0;
    runner.handler = async (request) => {
      running++;
      peak = Math.max(peak, running);
      await gate.promise;
      running--;
      return makeAttempt(request.id, { decision: true });
    };
    const ids = [observe("A?"), observe("B?"), observe("C?")];

    setTime(T);
    expect(scheduler.tick()).toBe(2);
    expect(scheduler.inFlightCount()).toBe(2);
    expect(scheduler.tick()).toBe(0);

    gate.resolve();
    await scheduler.idle();
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();

    expect(peak).toBe(2);
    expect(ids.map((id) => store.require(id).finalReason)).toEqual(["settled", "settled", "settled"]);
  });

  it("does not charge an attempt for transient failures", async () => {
    runner.handler = async () => {
      throw new SandboxUnavailableError("sandbox down");
    };
    const id = observe("Will it rain?");

    setTime(T);
    scheduler.tick();
    await scheduler.idle();
    expect(store.require(id)).toMatchObject({ attemptCount: 0, failureCount: 1, lastError: "sandbox down" });

    runner.handler = async () => {
      throw new ExecutionFailedError("Resolution code failed: boom");
    };
    setTime(T + 500);
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();
    expect(store.require(id)).toMatchObject({ attemptCount: 1, failureCount: 2 });
    expect(store.require(id).nextAttemptAt).toBe(T + 500 + 1000);
  });

  it("alerts once the attempt budget is exhausted and waits for the deadline", async () => {
    runner.handler = async (request) => makeAttempt(request.id, { decision: "maybe" });
    const id = observe("Will it rain?");

    for (let round = 0; round < 3; round++) {
      setTime(T + round * 10_000);
      expect(scheduler.tick()).toBe(1);
      await scheduler.idle();
    }

    expect(store.require(id).attemptCount).toBe(3);
    expect(store.require(id).lastError).toBe(
      'Verifier rejected output: decision "maybe" is not one of true, false, invalid'
    );
    expect(notifier.messages).toHaveLength(1);
    expect(notifier.messages[0]).toContain(`Request ${id} exhausted 3 attempts`);

    setTime(T + 100_000);
    expect(scheduler.tick()).toBe(0);
    expect(runner.calls).toHaveLength(3);

    setTime(T + 3_600_000);
    scheduler.tick();
    expect(store.require(id).finalReason).toBe("defaulted");
  });

  it("holds an unauthorized signer for the operator and resumes on retry", async () => {
    oracle.authorized = false;
    const id = observe("Will it rain?");

    setTime(T);
    scheduler.tick();
    await scheduler.idle();

    const held = store.require(id);
    expect(held).toMatchObject({ state: "waiting_retry", operatorHold: true, attemptCount: 1 });
    expect(notifier.messages).toEqual([
      `Request ${id} needs operator attention: Signer 0xsigner is not authorized to settle`,
    ]);
    expect(store.getUnsettledEvidence(id)).toBeNull();

    setTime(T + 60_000);
    expect(scheduler.tick()).toBe(0);

    oracle.authorized = true;
    const released = await scheduler.applyOverride(id, { action: "retry" });
    expect(released).toMatchObject({ operatorHold: false, attemptCount: 0 });
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();

    expect(store.require(id).finalReason).toBe("settled");
    expect(runner.calls).toHaveLength(2);
    expect(store.listEvidence(id)).toHaveLength(2);
  });

  it("retries only the settlement when accepted evidence is waiting", async () => {
    oracle.failNextSubmits = [new TransientChainError("rpc timeout")];
    const id = observe("Will it rain?");

    setTime(T);
    scheduler.tick();
    await scheduler.idle();
    expect(store.require(id)).toMatchObject({ state: "waiting_retry", attemptCount: 0, lastError: "rpc timeout" });
    expect(store.getUnsettledEvidence(id)).not.toBeNull();

    setTime(T + 500);
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();

    expect(runner.calls).toHaveLength(1);
    expect(store.listEvidence(id)).toHaveLength(1);
    expect(store.require(id).finalReason).toBe("settled");
  });

  it("settles an operator-supplied outcome", async () => {
    runner.handler = async () => {
      throw new ExecutionFailedError("Resolution code failed: boom");
    };
    const id = observe("Will it rain?");
    setTime(T);
    scheduler.tick();
    await scheduler.idle();

    const started = await scheduler.applyOverride(id, {
      action: "outcome",
      outcome: { kind: "binary", decision: false },
      reason: "checked by hand",
    });
    expect(started.state).toBe("resolving");
    await expect(scheduler.applyOverride(id, { action: "retry" })).rejects.toBeInstanceOf(OverrideConflictError);
    await scheduler.idle();

    expect(oracle.submissions.map((s) => s.price)).toEqual([0n]);
    expect(store.require(id).finalReason).toBe("settled");
    const evidence = store.listEvidence(id);
    expect(evidence.map((b) => [b.codeSource, b.reason])).toEqual([["operator", "checked by hand"]]);
    await expect(scheduler.applyOverride(id, { action: "retry" })).rejects.toThrow(
      `Request ${id} is already finalized (settled)`
    );
  });

  it("holds an operator outcome behind the clock and eligibility gates", async () => {
    build({}, 1000);
    await clock.sync();
    const id = observe("Will it rain?", { earliestResolveTime: T + 5000, deadline: T + 3_600_000 });

    setTime(T);
    expect(clock.now().stale).toBe(true);
    const queued = await scheduler.applyOverride(id, {
      action: "outcome",
      outcome: { kind: "binary", decision: true },
    });
    expect(queued.state).toBe("scheduled");
    expect(scheduler.isInFlight(id)).toBe(false);

    timeSource.time = T;
    await clock.sync();
    expect(scheduler.tick()).toBe(0);
    expect(store.require(id).state).toBe("scheduled");

    setTime(T + 5000);
    timeSource.time = T + 5000;
    await clock.sync();
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();

    expect(runner.calls).toEqual([]);
    expect(oracle.submissions.map((s) => s.price)).toEqual([ONE]);
    expect(store.require(id).finalReason).toBe("settled");
  });

  it("settles a numeric value finer than the price precision", async () => {
    runner.handler = async (request) => makeAttempt(request.id, { value: 1 / 3000 });
    const id = observe("Ratio of A to B?\ntype: numeric");

    setTime(T);
    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();

    expect(store.require(id)).toMatchObject({ finalReason: "settled", failureCount: 0 });
    expect(oracle.submissions.map((s) => s.price)).toEqual([333_333_333_333_333n]);
  });

  it("tells the runner to forget requests once they are finalized", () => {
    const defaulted = observe("Will it rain?", { earliestResolveTime: T, deadline: T + 100 });
    const external = observe("Will it snow?");

    store.markExternal(external, T);
    setTime(T + 200);
    scheduler.tick();

    expect(runner.forgotten).toEqual([external, defaulted]);
  });

  it("recovers attempts interrupted by a restart", async () => {
    const id = observe("Will it rain?");
    store.beginAttempt(id, T);

    setTime(T + 1000);
    scheduler.start();
    expect(store.require(id)).toMatchObject({ state: "waiting_retry", lastError: "interrupted by restart" });

    expect(scheduler.tick()).toBe(1);
    await scheduler.idle();
    expect(store.require(id).finalReason).toBe("settled");
  });
});
