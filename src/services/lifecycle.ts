import Database from "better-sqlite3";
import { IllegalTransitionError, RequestNotFoundError, ResolutionError } from "./errors";
import {
  CodeSource,
  ConfirmationState,
  EvidenceBundle,
  EvidenceStore,
  FinalReason,
  RequestState,
  RequestView,
  ResolutionRequest,
  SettlementRecord,
  SourceExchange,
  TranscriptEntry,
  TranscriptSink,
} from "./types";
import { hashEvidence } from "./evidence";

export type Transition =
  | { to: "resolving" }
  | { to: "waiting_retry" }
  | { to: "finalized"; reason: FinalReason };

export interface TransitionEvent {
  requestId: string;
  from: RequestState;
  to: RequestState;
  reason: FinalReason | null;
  at: number;
}

type TransitionKey = "resolving" | "waiting_retry" | `finalized:${FinalReason}`;

const LEGAL_TRANSITIONS: Record<RequestState, TransitionKey[]> = {
  scheduled: ["resolving", "finalized:defaulted", "finalized:external"],
  resolving: ["waiting_retry", "finalized:settled", "finalized:external"],
  waiting_retry: ["resolving", "finalized:defaulted", "finalized:external"],
  finalized: [],
};

function transitionKey(t: Transition): TransitionKey {
  return t.to === "finalized" ? `finalized:${t.reason}` : t.to;
}

export function isLegalTransition(from: RequestState, t: Transition): boolean {
  return LEGAL_TRANSITIONS[from].includes(transitionKey(t));
}

const SCHEMA_VERSION = 1;

interface RequestRow {
  id: string;
  identifier: string;
  requester: string;
  ancillary_data: string;
  request_timestamp: number;
  earliest_resolve_time: number;
  deadline: number;
  state: string;
  final_reason: string | null;
  attempt_count: number;
  failure_count: number;
  last_error: string | null;
  last_attempt_at: number | null;
  next_attempt_at: number | null;
  operator_hold: number;
  created_at: number;
  updated_at: number;
}

interface EvidenceRow {
  request_id: string;
  sequence: number;
  bundle: string;
  evidence_hash: string;
  settlement_tx_hash: string | null;
  spent: number;
}

interface SettlementRow {
  request_id: string;
  tx_hash: string;
  submitted_price: string;
  evidence_hash: string;
  raw_tx: string | null;
  confirmation_state: string;
  error: string | null;
  created_at: number;
  updated_at: number;
}

interface TranscriptRow {
  request_id: string;
  started_at: number;
  code_source: string;
  code: string;
  stdout: string;
  stderr: string;
  return_value: string | null;
  exchanges: string;
  error: string | null;
}

function parseState(value: string): RequestState {
  switch (value) {
    case "scheduled":
    case "resolving":
    case "waiting_retry":
    case "finalized":
      return value;
    default:
      throw new ResolutionError(`Unknown request state in store: ${value}`, "programming");
  }
}

function parseFinalReason(value: string | null): FinalReason | null {
  switch (value) {
    case null:
      return null;
    case "settled":
    case "defaulted":
    case "external":
      return value;
    default:
      throw new ResolutionError(`Unknown final reason in store: ${value}`, "programming");
  }
}

function parseCodeSource(value: string): CodeSource {
  switch (value) {
    case "template":
    case "generated":
    case "operator":
    case "default":
      return value;
    default:
      throw new ResolutionError(`Unknown code source in store: ${value}`, "programming");
  }
}

function parseConfirmation(value: string): ConfirmationState {
  switch (value) {
    case "pending":
    case "confirmed":
    case "failed":
      return value;
    default:
      throw new ResolutionError(`Unknown confirmation state in store: ${value}`, "programming");
  }
}

function toRequest(row: RequestRow): ResolutionRequest {
  return {
    id: row.id,
    identifier: row.identifier,
    requester: row.requester,
    ancillaryData: row.ancillary_data,
    requestTimestamp: row.request_timestamp,
    earliestResolveTime: row.earliest_resolve_time,
    deadline: row.deadline,
    state: parseState(row.state),
    finalReason: parseFinalReason(row.final_reason),
    attemptCount: row.attempt_count,
    failureCount: row.failure_count,
    lastError: row.last_error,
    lastAttemptAt: row.last_attempt_at,
    nextAttemptAt: row.next_attempt_at,
    operatorHold: row.operator_hold === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toSettlement(row: SettlementRow): SettlementRecord {
  return {
    requestId: row.request_id,
    txHash: row.tx_hash,
    submittedPrice: row.submitted_price,
    evidenceHash: row.evidence_hash,
    rawTx: row.raw_tx,
    confirmationState: parseConfirmation(row.confirmation_state),
    error: row.error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTranscript(row: TranscriptRow): TranscriptEntry {
  const exchanges: SourceExchange[] = JSON.parse(row.exchanges);
  return {
    requestId: row.request_id,
    startedAt: row.started_at,
    codeSource: parseCodeSource(row.code_source),
    code: row.code,
    stdout: row.stdout,
    stderr: row.stderr,
    returnValue: row.return_value === null ? undefined : JSON.parse(row.return_value),
    exchanges,
    error: row.error,
  };
}

function toBundle(row: EvidenceRow): EvidenceBundle {
  const bundle: EvidenceBundle = JSON.parse(row.bundle);
  return { ...bundle, settlementTxHash: row.settlement_tx_hash };
}

export interface FailureUpdate {
  error: string;
  consumesAttempt: boolean;
  nextAttemptAt: number;
  hold?: boolean;
}

export type ObservedChange = "created" | "updated" | "unchanged";

/**
 * Durable request lifecycle plus evidence artifacts. This is the only writer of
 * request state; every transition is checked against the legal edges and applied
 * inside a transaction, so concurrent callers for one id are serialized.
 */
export class LifecycleStore implements EvidenceStore, TranscriptSink {
  private readonly db: Database.Database;
  private readonly listeners = new Set<(event: TransitionEvent) => void>();

  constructor(path = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.migrate();
  }

  close(): void {
    this.db.close();
  }

  private migrate(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        )
      `);
      const row = this.db
        .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get();
      const current = row?.version ?? 0;
      if (current >= SCHEMA_VERSION) return;

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS requests (
          id TEXT PRIMARY KEY,
          identifier TEXT NOT NULL,
          requester TEXT NOT NULL,
          ancillary_data TEXT NOT NULL,
          request_timestamp INTEGER NOT NULL,
          earliest_resolve_time INTEGER NOT NULL,
          deadline INTEGER NOT NULL,
          state TEXT NOT NULL,
          final_reason TEXT,
          attempt_count INTEGER NOT NULL DEFAULT 0,
          failure_count INTEGER NOT NULL DEFAULT 0,
          last_error TEXT,
          last_attempt_at INTEGER,
          next_attempt_at INTEGER,
          operator_hold INTEGER NOT NULL DEFAULT 0,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_requests_state ON requests(state);

        CREATE TABLE IF NOT EXISTS evidence (
          request_id TEXT NOT NULL,
          sequence INTEGER NOT NULL,
          bundle TEXT NOT NULL,
          evidence_hash TEXT NOT NULL,
          settlement_tx_hash TEXT,
          spent INTEGER NOT NULL DEFAULT 0,
          created_at TEXT DEFAULT CURRENT_TIMESTAMP,
          PRIMARY KEY (request_id, sequence)
        );

        CREATE TABLE IF NOT EXISTS settlements (
          request_id TEXT PRIMARY KEY,
          tx_hash TEXT NOT NULL,
          submitted_price TEXT NOT NULL,
          evidence_hash TEXT NOT NULL,
          raw_tx TEXT,
          confirmation_state TEXT NOT NULL,
          error TEXT,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS transcripts (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          request_id TEXT NOT NULL,
          started_at INTEGER NOT NULL,
          code_source TEXT NOT NULL,
          code TEXT NOT NULL,
          stdout TEXT NOT NULL,
          stderr TEXT NOT NULL,
          return_value TEXT,
          exchanges TEXT NOT NULL,
          error TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_transcripts_request ON transcripts(request_id);
      `);
      this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
    });
    tx();
  }

  onTransition(listener: (event: TransitionEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  get(id: string): ResolutionRequest | null {
    const row = this.db.prepare<[string], RequestRow>(`SELECT * FROM requests WHERE id = ?`).get(id);
    return row ? toRequest(row) : null;
  }

  require(id: string): ResolutionRequest {
    const request = this.get(id);
    if (!request) throw new RequestNotFoundError(id);
    return request;
  }

  list(state?: RequestState): ResolutionRequest[] {
    const rows = state
      ? this.db
          .prepare<[string], RequestRow>(`SELECT * FROM requests WHERE state = ? ORDER BY created_at`)
          .all(state)
      : this.db.prepare<[], RequestRow>(`SELECT * FROM requests ORDER BY created_at`).all();
    return rows.map(toRequest);
  }

  listActive(): ResolutionRequest[] {
    return this.db
      .prepare<[], RequestRow>(`SELECT * FROM requests WHERE state != 'finalized' ORDER BY created_at`)
      .all()
      .map(toRequest);
  }

  countByState(): Record<RequestState, number> {
    const counts: Record<RequestState, number> = { scheduled: 0, resolving: 0, waiting_retry: 0, finalized: 0 };
    const rows = this.db
      .prepare<[], { state: string; n: number }>(`SELECT state, COUNT(*) AS n FROM requests GROUP BY state`)
      .all();
    for (const row of rows) counts[parseState(row.state)] = row.n;
    return counts;
  }

  /** Idempotent: re-observing a tracked request with unchanged fields writes nothing. */
  upsertObserved(
    view: RequestView,
    schedule: { earliestResolveTime: number; deadline: number },
    now: number
  ): { change: ObservedChange; request: ResolutionRequest } {
    const tx = this.db.transaction((): { change: ObservedChange; request: ResolutionRequest } => {
      const existing = this.get(view.id);
      if (!existing) {
        this.db
          .prepare(
            `INSERT INTO requests (id, identifier, requester, ancillary_data, request_timestamp,
               earliest_resolve_time, deadline, state, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, 'scheduled', ?, ?)`
          )
          .run(
            view.id,
            view.identifier,
            view.requester,
            view.ancillaryData,
            view.timestamp * 1000,
            schedule.earliestResolveTime,
            schedule.deadline,
            now,
            now
          );
        return { change: "created", request: this.require(view.id) };
      }

      const unchanged =
        existing.requester === view.requester &&
        existing.earliestResolveTime === schedule.earliestResolveTime &&
        existing.deadline === schedule.deadline;
      if (unchanged || existing.state === "finalized") return { change: "unchanged", request: existing };

      this.db
        .prepare(
          `UPDATE requests SET requester = ?, earliest_resolve_time = ?, deadline = ?, updated_at = ? WHERE id = ?`
        )
        .run(view.requester, schedule.earliestResolveTime, schedule.deadline, now, view.id);
      return { change: "updated", request: this.require(view.id) };
    });
    return tx();
  }

  private applyTransition(
    id: string,
    t: Transition,
    now: number,
    extra: { sql: string; params: (string | number | null)[] } | null
  ): ResolutionRequest {
    const tx = this.db.transaction((): { request: ResolutionRequest; event: TransitionEvent } => {
      const current = this.require(id);
      if (!isLegalTransition(current.state, t)) {
        throw new IllegalTransitionError(id, current.state, transitionKey(t));
      }
      const reason = t.to === "finalized" ? t.reason : null;
      this.db
        .prepare(`UPDATE requests SET state = ?, final_reason = ?, updated_at = ? WHERE id = ?`)
        .run(t.to, reason, now, id);
      if (extra) this.db.prepare(extra.sql).run(...extra.params, id);
      return {
        request: this.require(id),
        event: { requestId: id, from: current.state, to: t.to, reason, at: now },
      };
    });
    const { request, event } = tx();
    for (const listener of this.listeners) listener(event);
    return request;
  }

  /** Single-flight: fails unless the request is idle in `scheduled` or `waiting_retry`. */
  beginAttempt(id: string, now: number): ResolutionRequest {
    return this.applyTransition(id, { to: "resolving" }, now, {
      sql: `UPDATE requests SET last_attempt_at = ? WHERE id = ?`,
      params: [now],
    });
  }

  recordFailure(id: string, update: FailureUpdate, now: number): ResolutionRequest {
    return this.applyTransition(id, { to: "waiting_retry" }, now, {
      sql: `UPDATE requests SET
              failure_count = failure_count + 1,
              attempt_count = attempt_count + ?,
              last_error = ?,
              next_attempt_at = ?,
              operator_hold = MAX(operator_hold, ?)
            WHERE id = ?`,
      params: [update.consumesAttempt ? 1 : 0, update.error, update.nextAttemptAt, update.hold ? 1 : 0],
    });
  }

  finalize(id: string, reason: FinalReason, now: number, lastError: string | null = null): ResolutionRequest {
    return this.applyTransition(
      id,
      { to: "finalized", reason },
      now,
      lastError === null
        ? { sql: `UPDATE requests SET next_attempt_at = NULL WHERE id = ?`, params: [] }
        : { sql: `UPDATE requests SET next_attempt_at = NULL, last_error = ? WHERE id = ?`, params: [lastError] }
    );
  }

  /** Returns false when the request is unknown or already terminal. */
  markExternal(id: string, now: number): boolean {
    const request = this.get(id);
    if (!request || request.state === "finalized") return false;
    this.finalize(id, "external", now);
    return true;
  }

  /** Operator retry: lifts a hold and resets the attempt budget of a request waiting to retry. */
  releaseHold(id: string, now: number): ResolutionRequest {
    const tx = this.db.transaction((): ResolutionRequest => {
      const current = this.require(id);
      if (current.state !== "waiting_retry") {
        throw new IllegalTransitionError(id, current.state, "waiting_retry");
      }
      this.db
        .prepare(
          `UPDATE requests SET operator_hold = 0, attempt_count = 0, next_attempt_at = ?, updated_at = ? WHERE id = ?`
        )
        .run(now, now, id);
      return this.require(id);
    });
    return tx();
  }

  /** Requests left in `resolving` by a previous process have no task behind them. */
  recoverInterrupted(now: number): number {
    const stuck = this.list("resolving");
    for (const request of stuck) {
      this.recordFailure(
        request.id,
        { error: "interrupted by restart", consumesAttempt: false, nextAttemptAt: now },
        now
      );
    }
    return stuck.length;
  }

  // ---------------------------------------------------------------------------
  // Evidence
  // ---------------------------------------------------------------------------

  nextEvidenceSequence(requestId: string): number {
    const row = this.db
      .prepare<[string], { max: number | null }>(`SELECT MAX(sequence) AS max FROM evidence WHERE request_id = ?`)
      .get(requestId);
    return (row?.max ?? 0) + 1;
  }

  /** Bundles are immutable; writing the same (request, sequence) twice is an error. */
  putEvidence(bundle: EvidenceBundle): string {
    const evidenceHash = hashEvidence(bundle);
    const stored: EvidenceBundle = { ...bundle, settlementTxHash: null };
    try {
      this.db
        .prepare(`INSERT INTO evidence (request_id, sequence, bundle, evidence_hash) VALUES (?, ?, ?, ?)`)
        .run(bundle.requestId, bundle.sequence, JSON.stringify(stored), evidenceHash);
    } catch (e) {
      throw new ResolutionError(
        `Evidence ${bundle.requestId}#${bundle.sequence} already written: ${e instanceof Error ? e.message : String(e)}`,
        "programming"
      );
    }
    return evidenceHash;
  }

  getEvidence(requestId: string): EvidenceBundle | null {
    const row = this.db
      .prepare<[string], EvidenceRow>(
        `SELECT * FROM evidence WHERE request_id = ? ORDER BY sequence DESC LIMIT 1`
      )
      .get(requestId);
    return row ? toBundle(row) : null;
  }

  listEvidence(requestId: string): EvidenceBundle[] {
    return this.db
      .prepare<[string], EvidenceRow>(`SELECT * FROM evidence WHERE request_id = ? ORDER BY sequence`)
      .all(requestId)
      .map(toBundle);
  }

  /** Latest bundle that still awaits settlement, if any. */
  getUnsettledEvidence(requestId: string): { bundle: EvidenceBundle; evidenceHash: string } | null {
    const row = this.db
      .prepare<[string], EvidenceRow>(
        `SELECT * FROM evidence WHERE request_id = ? ORDER BY sequence DESC LIMIT 1`
      )
      .get(requestId);
    if (!row || row.spent === 1 || row.settlement_tx_hash !== null) return null;
    return { bundle: toBundle(row), evidenceHash: row.evidence_hash };
  }

  markEvidenceSpent(requestId: string, sequence: number): void {
    this.db.prepare(`UPDATE evidence SET spent = 1 WHERE request_id = ? AND sequence = ?`).run(requestId, sequence);
  }

  attachSettlementTx(requestId: string, sequence: number, txHash: string): void {
    this.db
      .prepare(
        `UPDATE evidence SET settlement_tx_hash = ? WHERE request_id = ? AND sequence = ? AND settlement_tx_hash IS NULL`
      )
      .run(txHash, requestId, sequence);
  }

  // ---------------------------------------------------------------------------
  // Settlements
  // ---------------------------------------------------------------------------

  getSettlement(requestId: string): SettlementRecord | null {
    const row = this.db
      .prepare<[string], SettlementRow>(`SELECT * FROM settlements WHERE request_id = ?`)
      .get(requestId);
    return row ? toSettlement(row) : null;
  }

  /** A tx hash is written once; only a definitively failed record may be replaced. */
  recordSubmission(
    requestId: string,
    txHash: string,
    submittedPrice: string,
    evidenceHash: string,
    now: number,
    rawTx: string | null = null
  ): SettlementRecord {
    const tx = this.db.transaction((): SettlementRecord => {
      const existing = this.getSettlement(requestId);
      if (existing && existing.confirmationState !== "failed") {
        throw new ResolutionError(
          `Settlement for ${requestId} already submitted as ${existing.txHash}`,
          "programming"
        );
      }
      this.db
        .prepare(
          `INSERT OR REPLACE INTO settlements
             (request_id, tx_hash, submitted_price, evidence_hash, raw_tx, confirmation_state, error, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, 'pending', NULL, ?, ?)`
        )
        .run(requestId, txHash, submittedPrice, evidenceHash, rawTx, now, now);
      const record = this.getSettlement(requestId);
      if (!record) throw new ResolutionError(`Settlement for ${requestId} was not written`, "programming");
      return record;
    });
    return tx();
  }

  updateSettlement(
    requestId: string,
    state: ConfirmationState,
    error: string | null,
    now: number
  ): SettlementRecord | null {
    this.db
      .prepare(
        `UPDATE settlements SET confirmation_state = ?, error = ?, updated_at = ?
         WHERE request_id = ? AND confirmation_state != 'confirmed'`
      )
      .run(state, error, now, requestId);
    return this.getSettlement(requestId);
  }

  // ---------------------------------------------------------------------------
  // Transcripts
  // ---------------------------------------------------------------------------

  recordTranscript(entry: TranscriptEntry): void {
    this.db
      .prepare(
        `INSERT INTO transcripts
           (request_id, started_at, code_source, code, stdout, stderr, return_value, exchanges, error)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.requestId,
        entry.startedAt,
        entry.codeSource,
        entry.code,
        entry.stdout,
        entry.stderr,
        entry.returnValue === undefined ? null : JSON.stringify(entry.returnValue),
        JSON.stringify(entry.exchanges),
        entry.error
      );
  }

  /** Every execution recorded for the request, oldest first. */
  listTranscripts(requestId: string): TranscriptEntry[] {
    return this.db
      .prepare<[string], TranscriptRow>(`SELECT * FROM transcripts WHERE request_id = ? ORDER BY id`)
      .all(requestId)
      .map(toTranscript);
  }

}
