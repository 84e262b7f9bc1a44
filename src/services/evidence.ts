import { keccak256, parseUnits, toUtf8Bytes } from "ethers";
import { Attempt, BinaryDecision, ClockProof, CodeSource, EvidenceBundle, Outcome } from "./types";

const ONE = 10n ** 18n;

/** On-chain price encodings (int256, 18 decimals). */
export const PRICE_YES = ONE;
export const PRICE_NO = 0n;
export const PRICE_INVALID = ONE / 2n;

/** Key-sorted JSON, so equal values always hash equally. Undefined members are dropped like JSON.stringify. */
export function stableStringify(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new Error(`Cannot serialize non-finite number: ${value}`);
    return JSON.stringify(value);
  }
  if (typeof value === "boolean" || typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value)) {
    return "[" + value.map((v) => (v === undefined ? "null" : stableStringify(v))).join(",") + "]";
  }
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") + "}";
  }
  throw new Error(`Cannot serialize value of type ${typeof value}`);
}

/** Magnitudes from here on print in exponent form even through `toFixed`. */
export const MAX_NUMERIC_OUTCOME = 1e21;

export function isEncodable(value: number): boolean {
  return Number.isFinite(value) && Math.abs(value) < MAX_NUMERIC_OUTCOME;
}

function decimalString(value: number): string {
  if (!isEncodable(value)) throw new RangeError(`Outcome ${value} cannot be encoded as an 18-decimal price`);
  const plain = String(value);
  const decimals = plain.split(".")[1] ?? "";
  if (!/e/i.test(plain) && decimals.length <= 18) return plain;
  // anything finer than 18 decimals is rounded to the price's precision
  return value.toFixed(18).replace(/0+$/, "").replace(/\.$/, "");
}

export function encodeOutcome(outcome: Outcome): bigint {
  if (outcome.kind === "numeric") return parseUnits(decimalString(outcome.value), 18);
  if (outcome.decision === "invalid") return PRICE_INVALID;
  return outcome.decision ? PRICE_YES : PRICE_NO;
}

export function describeOutcome(outcome: Outcome): string {
  if (outcome.kind === "numeric") return String(outcome.value);
  if (outcome.decision === "invalid") return "INVALID";
  return outcome.decision ? "YES" : "NO";
}

const DECISION_WORDS = new Map<string, BinaryDecision>([
  ["yes", true],
  ["true", true],
  ["no", false],
  ["false", false],
  ["invalid", "invalid"],
]);

/** Parses operator input: yes/no/true/false/invalid or a number. */
export function parseOutcome(input: string): Outcome | null {
  const normalized = input.trim().toLowerCase();
  const decision = DECISION_WORDS.get(normalized);
  if (decision !== undefined) return { kind: "binary", decision };
  if (normalized === "") return null;
  const n = Number(normalized);
  return isEncodable(n) ? { kind: "numeric", value: n } : null;
}

/** keccak256 over the stable JSON of the bundle, excluding the settlement tx hash attached later. */
export function hashEvidence(bundle: EvidenceBundle): string {
  const { settlementTxHash: _attachedLater, ...content } = bundle;
  return keccak256(toUtf8Bytes(stableStringify(content)));
}

export function bundleFromAttempt(
  attempt: Attempt,
  outcome: Outcome,
  sequence: number,
  clock: ClockProof | null,
  now: number
): EvidenceBundle {
  return {
    requestId: attempt.requestId,
    sequence,
    codeSource: attempt.codeSource,
    templateId: attempt.templateId,
    code: attempt.generatedCode,
    output: attempt.rawOutput,
    outcome,
    price: encodeOutcome(outcome).toString(),
    sources: attempt.sourceEvidence,
    clock,
    reason: null,
    createdAt: new Date(now).toISOString(),
    settlementTxHash: null,
  };
}

/** Bundle for an outcome that did not come from executed code (deadline default or operator). */
export function syntheticBundle(
  requestId: string,
  codeSource: Extract<CodeSource, "default" | "operator">,
  outcome: Outcome,
  sequence: number,
  clock: ClockProof | null,
  reason: string,
  now: number
): EvidenceBundle {
  return {
    requestId,
    sequence,
    codeSource,
    templateId: null,
    code: "",
    output: null,
    outcome,
    price: encodeOutcome(outcome).toString(),
    sources: [],
    clock,
    reason,
    createdAt: new Date(now).toISOString(),
    settlementTxHash: null,
  };
}
