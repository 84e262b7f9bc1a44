export type RequestState = "scheduled" | "resolving" | "waiting_retry" | "finalized";

export type FinalReason = "settled" | "defaulted" | "external";

export interface ResolutionRequest {
  id: string;
  identifier: string;
  requester: string;
  /** hex-encoded ancillary bytes */
  ancillaryData: string;
  requestTimestamp: number;
  earliestResolveTime: number;
  deadline: number;
  state: RequestState;
  finalReason: FinalReason | null;
  attemptCount: number;
  failureCount: number;
  lastError: string | null;
  lastAttemptAt: number | null;
  nextAttemptAt: number | null;
  operatorHold: boolean;
  createdAt: number;
  updatedAt: number;
}

/** One row of the oracle's outstanding-request view. Times are unix seconds, as on-chain. */
export interface RequestView {
  id: string;
  identifier: string;
  requester: string;
  timestamp: number;
  ancillaryData: string;
  settled: boolean;
}

export type BinaryDecision = true | false | "invalid";

export type Outcome =
  | { kind: "binary"; decision: BinaryDecision }
  | { kind: "numeric"; value: number };

export type CodeSource = "template" | "generated" | "operator" | "default";

export interface SourceExchange {
  url: string;
  method: string;
  status: number;
  body: string;
}

export interface SourceEvidence {
  url: string;
  hash: string;
}

export interface RawOutput {
  stdout: string;
  stderr: string;
  returnValue: unknown;
  exitCode: number;
}

export interface Attempt {
  requestId: string;
  startedAt: number;
  codeSource: CodeSource;
  templateId: string | null;
  generatedCode: string;
  rawOutput: RawOutput;
  /** structured payload pulled from the return value or stdout; unvalidated */
  output: unknown;
  sourceEvidence: SourceEvidence[];
  transcript: SourceExchange[];
}

export interface ClockProof {
  time: number;
  syncedAt: number;
  offset: number;
  proof: string;
}

export interface EvidenceBundle {
  requestId: string;
  sequence: number;
  codeSource: CodeSource;
  templateId: string | null;
  code: string;
  output: RawOutput | null;
  outcome: Outcome;
  price: string;
  sources: SourceEvidence[];
  clock: ClockProof | null;
  reason: string | null;
  createdAt: string;
  settlementTxHash: string | null;
}

export type ConfirmationState = "pending" | "confirmed" | "failed";

export interface SettlementRecord {
  requestId: string;
  txHash: string;
  submittedPrice: string;
  evidenceHash: string;
  /** signed transaction bytes, kept so a resumed settlement re-sends the same transaction */
  rawTx: string | null;
  confirmationState: ConfirmationState;
  error: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface TimeSample {
  /** authoritative time, epoch milliseconds */
  time: number;
  proof: string;
}

export type TxConfirmation = "pending" | "confirmed" | "reverted";

export interface SignedSettlement {
  txHash: string;
  rawTx: string;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface OracleSource {
  listOutstanding(): Promise<RequestView[]>;
  isSettled(requestId: string): Promise<boolean>;
  /** Builds and signs the settlement without sending it; consumes a nonce. */
  prepareSettlement(requestId: string, price: bigint, evidenceHash: string): Promise<SignedSettlement>;
  /** Sends signed bytes. Sending the same bytes again must not produce a second transaction. */
  broadcastSettlement(settlement: SignedSettlement): Promise<void>;
  getConfirmation(txHash: string): Promise<TxConfirmation>;
}

export interface SettlementAuthorizer {
  isAuthorized(): Promise<boolean>;
}

export interface TimeSource {
  fetchTime(): Promise<TimeSample>;
}

export interface CodeGenerator {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export interface SandboxRequest {
  code: string;
  timeoutMs: number;
  allowedHosts: string[];
}

export interface SandboxResult {
  stdout: string;
  stderr: string;
  returnValue: unknown;
  exitCode: number;
  transcript: SourceExchange[];
}

export interface Sandbox {
  execute(request: SandboxRequest): Promise<SandboxResult>;
}

export interface EvidenceStore {
  putEvidence(bundle: EvidenceBundle): string;
  getEvidence(requestId: string): EvidenceBundle | null;
}

export interface TranscriptEntry {
  requestId: string;
  startedAt: number;
  codeSource: CodeSource;
  code: string;
  stdout: string;
  stderr: string;
  returnValue: unknown;
  exchanges: SourceExchange[];
  error: string | null;
}

export interface TranscriptSink {
  recordTranscript(entry: TranscriptEntry): void;
}

export interface OperatorNotifier {
  alert(message: string): Promise<void>;
}
