import { z } from "zod";
import { Comparator, ResolutionRules, RoundingRule } from "./ancillary";
import { MAX_NUMERIC_OUTCOME, isEncodable } from "./evidence";
import { Attempt, BinaryDecision, Outcome } from "./types";

export type Verdict = { accepted: true; outcome: Outcome } | { accepted: false; reason: string };

const BinaryOutputSchema = z.object({
  decision: z.union([z.boolean(), z.string()]),
  value: z.union([z.number(), z.string()]).nullable().optional(),
});

const NumericOutputSchema = z.object({
  value: z.union([z.number(), z.string()]),
});

function toDecision(raw: boolean | string): BinaryDecision | null {
  if (typeof raw === "boolean") return raw;
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "yes":
      return true;
    case "false":
    case "no":
      return false;
    case "invalid":
      return "invalid";
    default:
      return null;
  }
}

function toNumber(raw: number | string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const n = typeof raw === "number" ? raw : Number(raw.trim());
  return Number.isFinite(n) ? n : null;
}

export function compare(value: number, comparator: Comparator, threshold: number): boolean {
  switch (comparator) {
    case ">":
      return value > threshold;
    case ">=":
      return value >= threshold;
    case "<":
      return value < threshold;
    case "<=":
      return value <= threshold;
  }
}

export function satisfiesRounding(value: number, rule: RoundingRule): boolean {
  if (rule.kind === "decimals") return Number(value.toFixed(rule.places)) === value;
  const q = value / rule.step;
  return Math.abs(q - Math.round(q)) <= 1e-9 * Math.max(1, Math.abs(q));
}

function reject(reason: string): Verdict {
  return { accepted: false, reason };
}

/**
 * Gatekeeper between untrusted resolution code and the chain. Checks run in a
 * fixed order: schema, then rounding and threshold rules, then source evidence.
 * A rejection is final for the attempt; nothing downstream relaxes it.
 */
export class ResultVerifier {
  verify(attempt: Attempt, rules: ResolutionRules): Verdict {
    let outcome: Outcome;
    let reported: number | null;

    // (a) schema
    if (rules.kind === "numeric") {
      const parsed = NumericOutputSchema.safeParse(attempt.output);
      if (!parsed.success) return reject("output has no numeric value field");
      const value = toNumber(parsed.data.value);
      if (value === null) return reject(`value ${JSON.stringify(parsed.data.value)} is not a finite number`);
      if (!isEncodable(value)) return reject(`value ${value} is too large to settle (limit ${MAX_NUMERIC_OUTCOME})`);
      if (rules.range && (value < rules.range.min || value > rules.range.max)) {
        return reject(`value ${value} outside declared range [${rules.range.min}, ${rules.range.max}]`);
      }
      outcome = { kind: "numeric", value };
      reported = value;
    } else {
      const parsed = BinaryOutputSchema.safeParse(attempt.output);
      if (!parsed.success) return reject("output has no decision field");
      const decision = toDecision(parsed.data.decision);
      if (decision === null) {
        return reject(`decision ${JSON.stringify(parsed.data.decision)} is not one of true, false, invalid`);
      }
      outcome = { kind: "binary", decision };
      reported = toNumber(parsed.data.value);
      if (parsed.data.value !== null && parsed.data.value !== undefined && reported === null) {
        return reject(`reported value ${JSON.stringify(parsed.data.value)} is not a finite number`);
      }
    }

    // (b) rounding and threshold rules
    if (reported !== null && rules.rounding && !satisfiesRounding(reported, rules.rounding)) {
      const granularity =
        rules.rounding.kind === "step" ? `step ${rules.rounding.step}` : `${rules.rounding.places} decimals`;
      return reject(`value ${reported} does not match rounding ${granularity}`);
    }
    if (
      outcome.kind === "binary" &&
      typeof outcome.decision === "boolean" &&
      rules.threshold &&
      reported !== null &&
      compare(reported, rules.threshold.comparator, rules.threshold.value) !== outcome.decision
    ) {
      return reject(
        `decision ${outcome.decision} contradicts value ${reported} ${rules.threshold.comparator} ${rules.threshold.value}`
      );
    }

    // (c) source evidence
    if (attempt.sourceEvidence.length === 0) return reject("no source evidence");
    const unhashed = attempt.sourceEvidence.find((s) => !s.hash || s.hash === "0x");
    if (unhashed) return reject(`source ${unhashed.url} has no evidence hash`);

    return { accepted: true, outcome };
  }
}
