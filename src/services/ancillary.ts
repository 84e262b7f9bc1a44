import { getBytes, isHexString, solidityPackedKeccak256, toUtf8String } from "ethers";
import { z } from "zod";

export type Comparator = ">" | ">=" | "<" | "<=";

export interface ThresholdRule {
  comparator: Comparator;
  value: number;
}

/**
 * Rounding policy named by the ancillary data. `step` means the reported value
 * must be a multiple of the step; `decimals` caps the number of decimal places.
 */
export type RoundingRule = { kind: "step"; step: number } | { kind: "decimals"; places: number };

export interface ResolutionRules {
  text: string;
  description: string;
  kind: "binary" | "numeric";
  template: string | null;
  /** epoch ms */
  resolveAfter: number | null;
  /** epoch ms */
  deadline: number | null;
  sources: string[];
  allowedHosts: string[];
  rounding: RoundingRule | null;
  range: { min: number; max: number } | null;
  threshold: ThresholdRule | null;
  params: Record<string, string>;
}

export interface EligibilityPolicy {
  settlementGraceMs: number;
  defaultDeadlineWindowMs: number;
}

const KNOWN_KEYS = new Set([
  "type",
  "template",
  "resolveafter",
  "deadline",
  "sources",
  "rounding",
  "min",
  "max",
  "threshold",
  "q",
  "question",
  "description",
]);

const URL_PATTERN = /https?:\/\/[^\s"'<>,]+/g;

const JsonAncillarySchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])
);

export function computeRequestId(identifier: string, timestamp: number, ancillaryData: string): string {
  return solidityPackedKeccak256(["bytes32", "uint256", "bytes"], [identifier, timestamp, ancillaryData]);
}

/** Decodes ancillary bytes as UTF-8, falling back to the hex text when they are not valid UTF-8. */
export function decodeAncillary(ancillaryData: string): string {
  if (!isHexString(ancillaryData)) return ancillaryData;
  if (ancillaryData === "0x") return "";
  try {
    return toUtf8String(getBytes(ancillaryData));
  } catch {
    return ancillaryData;
  }
}

function parseTime(value: string): number | null {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseNumber(value: string): number | null {
  const n = Number(value.trim().replace(/_/g, ""));
  return Number.isFinite(n) ? n : null;
}

export function parseThreshold(value: string): ThresholdRule | null {
  const match = value.trim().match(/^(>=|<=|>|<)\s*(-?[\d.]+)$/);
  if (!match) return null;
  const n = parseNumber(match[2]);
  if (n === null) return null;
  const comparator = match[1];
  if (comparator === ">" || comparator === ">=" || comparator === "<" || comparator === "<=") {
    return { comparator, value: n };
  }
  return null;
}

export function parseRounding(value: string): RoundingRule | null {
  const trimmed = value.trim();
  const [name, arg] = trimmed.includes(":") ? trimmed.split(":", 2) : ["step", trimmed];
  const n = parseNumber(arg);
  if (n === null || n <= 0) return null;
  switch (name.trim().toLowerCase()) {
    case "step":
      return { kind: "step", step: n };
    case "decimals":
      return Number.isInteger(n) ? { kind: "decimals", places: n } : null;
    default:
      return null;
  }
}

function splitSources(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function hostsOf(urls: string[]): string[] {
  const hosts = new Set<string>();
  for (const url of urls) {
    try {
      hosts.add(new URL(url).host);
    } catch {
      console.warn(`[Ancillary] Ignoring malformed source URL: ${url}`);
    }
  }
  return [...hosts];
}

function collectFields(text: string): { fields: Map<string, string>; prose: string } {
  const fields = new Map<string, string>();
  const trimmed = text.trim();

  if (trimmed.startsWith("{")) {
    try {
      const parsed = JsonAncillarySchema.safeParse(JSON.parse(trimmed));
      if (parsed.success) {
        for (const [key, value] of Object.entries(parsed.data)) {
          fields.set(key, Array.isArray(value) ? value.join(" ") : String(value));
        }
        return { fields, prose: "" };
      }
    } catch {
      // not JSON after all; read it as key: value text
    }
  }

  const prose: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = line.match(/^\s*([A-Za-z_][\w]*)\s*:\s*(.*)$/);
    if (match && !/^https?$/i.test(match[1])) {
      fields.set(match[1], match[2].trim());
    } else if (line.trim()) {
      prose.push(line.trim());
    }
  }
  return { fields, prose: prose.join(" ") };
}

export function parseRules(ancillaryData: string): ResolutionRules {
  const text = decodeAncillary(ancillaryData);
  const { fields, prose } = collectFields(text);

  const get = (key: string): string | undefined => {
    for (const [k, v] of fields) {
      if (k.toLowerCase() === key) return v;
    }
    return undefined;
  };

  const description = get("description") ?? get("q") ?? get("question") ?? prose;
  const sourcesField = get("sources");
  const sources = sourcesField
    ? splitSources(sourcesField)
    : [...new Set((text.match(URL_PATTERN) ?? []).map((u) => u.replace(/[.)\]]+$/, "")))];

  const min = get("min");
  const max = get("max");
  const minValue = min !== undefined ? parseNumber(min) : null;
  const maxValue = max !== undefined ? parseNumber(max) : null;

  const params: Record<string, string> = {};
  for (const [k, v] of fields) {
    if (!KNOWN_KEYS.has(k.toLowerCase())) params[k] = v;
  }

  const typeField = get("type")?.toLowerCase();
  const resolveAfter = get("resolveafter");
  const deadline = get("deadline");
  const rounding = get("rounding");
  const threshold = get("threshold");

  return {
    text,
    description,
    kind: typeField === "numeric" ? "numeric" : "binary",
    template: get("template") ?? null,
    resolveAfter: resolveAfter !== undefined ? parseTime(resolveAfter) : null,
    deadline: deadline !== undefined ? parseTime(deadline) : null,
    sources,
    allowedHosts: hostsOf(sources),
    rounding: rounding !== undefined ? parseRounding(rounding) : null,
    range:
      minValue !== null || maxValue !== null
        ? { min: minValue ?? Number.NEGATIVE_INFINITY, max: maxValue ?? Number.POSITIVE_INFINITY }
        : null,
    threshold: threshold !== undefined ? parseThreshold(threshold) : null,
    params,
  };
}

/** Times are epoch ms; `requestTimestamp` is already converted from chain seconds. */
export function deriveSchedule(
  rules: ResolutionRules,
  requestTimestamp: number,
  policy: EligibilityPolicy
): { earliestResolveTime: number; deadline: number } {
  const earliestResolveTime = rules.resolveAfter ?? requestTimestamp + policy.settlementGraceMs;
  const deadline = rules.deadline ?? earliestResolveTime + policy.defaultDeadlineWindowMs;
  return { earliestResolveTime, deadline };
}

export interface Placeholder {
  token: string;
  constName: string;
  value: string;
  description: string;
}

/** Replaces long hex literals with tokens so the model cannot mangle them. */
export function sanitizeAncillary(text: string): { sanitized: string; placeholders: Placeholder[] } {
  const placeholders: Placeholder[] = [];
  const sanitized = text.replace(/0x[0-9a-fA-F]{32,}/g, (literal) => {
    const n = placeholders.length + 1;
    const abbreviated = literal.length > 20 ? `${literal.slice(0, 10)}…${literal.slice(-6)}` : literal;
    const token = `__PLACEHOLDER_HEX_${n}__`;
    placeholders.push({
      token,
      constName: `PLACEHOLDER_HEX_${n}`,
      value: literal,
      description: `${abbreviated} (length ${literal.length})`,
    });
    return token;
  });
  return { sanitized, placeholders };
}

export function restorePlaceholders(code: string, placeholders: Placeholder[]): string {
  let restored = code;
  for (const p of placeholders) {
    restored = restored.split(p.token).join(p.value);
  }
  return restored;
}
