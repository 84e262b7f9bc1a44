import { Mutex, delay } from "./async";
import {
  DroppedTransactionError,
  ResolutionError,
  SettlementRevertedError,
  TransientChainError,
  UnauthorizedSignerError,
  classifyError,
  errorMessage,
} from "./errors";
import { LifecycleStore } from "./lifecycle";
import { OracleSource, SettlementAuthorizer, SettlementRecord } from "./types";

export interface SettlementOptions {
  /** label for the signing account in errors and logs */
  signer: string;
  txRetries: number;
  txRetryDelayMs: number;
  confirmationTimeoutMs: number;
  confirmationPollMs: number;
  now?: () => number;
}

export type SettlementResult =
  | { status: "confirmed"; record: SettlementRecord }
  | { status: "external"; record: SettlementRecord | null };

/**
 * Turns an accepted outcome into exactly one on-chain settlement. Transient RPC
 * failures are retried here at transaction level; anything thrown out of
 * `submit` is for the scheduler to handle at resolution level.
 */
export class SettlementSubmitter {
  private readonly nonceLock = new Mutex();
  private readonly now: () => number;

  constructor(
    private readonly oracle: OracleSource,
    private readonly authorizer: SettlementAuthorizer,
    private readonly store: LifecycleStore,
    private readonly options: SettlementOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async submit(requestId: string, price: bigint, evidenceHash: string): Promise<SettlementResult> {
    const existing = this.store.getSettlement(requestId);
    if (existing?.confirmationState === "confirmed") {
      return { status: "confirmed", record: existing };
    }
    if (existing?.confirmationState === "pending") {
      console.log(`[Settlement] ${requestId} resuming confirmation of ${existing.txHash}`);
      const pending: SettlementRecord = existing;
      const rawTx = pending.rawTx;
      if (rawTx !== null) await this.nonceLock.runExclusive(() => this.broadcast(pending, rawTx));
      return this.awaitConfirmation(pending);
    }

    if (await this.withTxRetries("isSettled", () => this.oracle.isSettled(requestId))) {
      console.log(`[Settlement] ${requestId} already settled on-chain, not submitting`);
      return { status: "external", record: existing };
    }

    const authorized = await this.withTxRetries("isAuthorized", () => this.authorizer.isAuthorized());
    if (!authorized) throw new UnauthorizedSignerError(this.options.signer);

    let record: SettlementRecord;
    try {
      record = await this.nonceLock.runExclusive(async () => {
        const signed = await this.withTxRetries("prepareSettlement", () =>
          this.oracle.prepareSettlement(requestId, price, evidenceHash)
        );
        // the hash is on record before anything is sent, so a retry or restart re-sends the same bytes
        const pending = this.store.recordSubmission(
          requestId,
          signed.txHash,
          price.toString(),
          evidenceHash,
          this.now(),
          signed.rawTx
        );
        await this.broadcast(pending, signed.rawTx);
        return pending;
      });
    } catch (e) {
      const error = classifyError(e);
      if (error instanceof SettlementRevertedError && (await this.settledElsewhere(requestId))) {
        return { status: "external", record: this.store.getSettlement(requestId) };
      }
      throw error;
    }

    console.log(`[Settlement] ${requestId} submitted price ${price} in ${record.txHash}`);
    return this.awaitConfirmation(record);
  }

  /** Sends the recorded bytes. A send that can never succeed marks the record failed so a new one may replace it. */
  private async broadcast(record: SettlementRecord, rawTx: string): Promise<void> {
    try {
      await this.withTxRetries("broadcastSettlement", () =>
        this.oracle.broadcastSettlement({ txHash: record.txHash, rawTx })
      );
    } catch (e) {
      const error = classifyError(e);
      if (error.kind !== "transient" || error instanceof DroppedTransactionError) {
        this.store.updateSettlement(record.requestId, "failed", error.message, this.now());
      }
      throw error;
    }
  }

  private async awaitConfirmation(record: SettlementRecord): Promise<SettlementResult> {
    const deadline = this.now() + this.options.confirmationTimeoutMs;
    while (true) {
      let state: "pending" | "confirmed" | "reverted" = "pending";
      try {
        state = await this.oracle.getConfirmation(record.txHash);
      } catch (e) {
        console.warn(`[Settlement] ${record.requestId} receipt lookup failed: ${errorMessage(e)}`);
      }

      if (state === "confirmed") {
        const confirmed = this.store.updateSettlement(record.requestId, "confirmed", null, this.now()) ?? record;
        console.log(`[Settlement] ${record.requestId} confirmed in ${record.txHash}`);
        return { status: "confirmed", record: confirmed };
      }

      if (state === "reverted") {
        const failed = this.store.updateSettlement(record.requestId, "failed", "transaction reverted", this.now());
        if (await this.settledElsewhere(record.requestId)) return { status: "external", record: failed };
        const authorized = await this.withTxRetries("isAuthorized", () => this.authorizer.isAuthorized());
        if (!authorized) throw new UnauthorizedSignerError(this.options.signer);
        throw new SettlementRevertedError(`Settlement ${record.txHash} reverted`, record.txHash);
      }

      if (this.now() >= deadline) {
        throw new TransientChainError(
          `Settlement ${record.txHash} not confirmed within ${this.options.confirmationTimeoutMs}ms`
        );
      }
      await delay(this.options.confirmationPollMs);
    }
  }

  private async settledElsewhere(requestId: string): Promise<boolean> {
    try {
      return await this.withTxRetries("isSettled", () => this.oracle.isSettled(requestId));
    } catch (e) {
      console.warn(`[Settlement] ${requestId} could not re-check settlement: ${errorMessage(e)}`);
      return false;
    }
  }

  private async withTxRetries<T>(label: string, fn: () => Promise<T>): Promise<T> {
    let last: ResolutionError | null = null;
    for (let attempt = 0; attempt <= this.options.txRetries; attempt++) {
      try {
        return await fn();
      } catch (e) {
        last = classifyError(e);
        if (last.kind !== "transient" || last instanceof DroppedTransactionError) break;
        if (attempt === this.options.txRetries) break;
        console.warn(
          `[Settlement] ${label} failed (attempt ${attempt + 1}/${this.options.txRetries + 1}): ${last.message}`
        );
        await delay(this.options.txRetryDelayMs * (attempt + 1));
      }
    }
    throw last ?? new TransientChainError(`${label} failed`);
  }
}
