import { ResolutionRules } from "./ancillary";

/**
 * Pre-vetted resolution programs. Each renders a self-contained Node.js script
 * that defines `resolveOracle`, fetches its sources, hashes every response body
 * and prints one JSON line: `{ decision | value, sources: [{ url, hash }] }`.
 */
export interface ResolutionTemplate {
  id: string;
  /** null when the rules lack something the template needs */
  render(rules: ResolutionRules): string | null;
}

const FETCH_HELPERS = `const crypto = require("crypto");

async function fetchJson(url, sources) {
  const res = await fetch(url, { headers: { accept: "application/json" } });
  const text = await res.text();
  if (!res.ok) throw new Error("HTTP " + res.status + " from " + url);
  sources.push({ url, hash: "0x" + crypto.createHash("sha256").update(text).digest("hex") });
  return JSON.parse(text);
}

function readField(body, path) {
  return path.split(".").reduce((node, key) => (node == null ? undefined : node[key]), body);
}`;

const RUNNER = `resolveOracle()
  .then((result) => console.log(JSON.stringify(result)))
  .catch((err) => {
    console.error(err && err.message ? err.message : String(err));
    process.exit(1);
  });`;

function fieldOf(rules: ResolutionRules): string {
  return rules.params.field ?? rules.params.path ?? "price";
}

export const priceThreshold: ResolutionTemplate = {
  id: "price-threshold",
  render(rules) {
    const url = rules.sources[0];
    if (!url || !rules.threshold) return null;
    return `${FETCH_HELPERS}

const SOURCE_URL = ${JSON.stringify(url)};
const FIELD = ${JSON.stringify(fieldOf(rules))};
const COMPARATOR = ${JSON.stringify(rules.threshold.comparator)};
const THRESHOLD = ${JSON.stringify(rules.threshold.value)};

async function resolveOracle() {
  const sources = [];
  const body = await fetchJson(SOURCE_URL, sources);
  const value = Number(readField(body, FIELD));
  if (!Number.isFinite(value)) {
    return { decision: "invalid", value: null, sources, reason: "field " + FIELD + " missing" };
  }
  const checks = {
    ">": value > THRESHOLD,
    ">=": value >= THRESHOLD,
    "<": value < THRESHOLD,
    "<=": value <= THRESHOLD,
  };
  return { decision: checks[COMPARATOR], value, sources };
}

${RUNNER}
`;
  },
};

export const numericValue: ResolutionTemplate = {
  id: "numeric-value",
  render(rules) {
    const url = rules.sources[0];
    if (!url) return null;
    const rounding = rules.rounding ?? { kind: "decimals", places: 6 };
    return `${FETCH_HELPERS}

const SOURCE_URL = ${JSON.stringify(url)};
const FIELD = ${JSON.stringify(fieldOf(rules))};
const ROUNDING = ${JSON.stringify(rounding)};

function round(value) {
  if (ROUNDING.kind === "step") {
    const decimals = (String(ROUNDING.step).split(".")[1] || "").length;
    return Number((Math.round(value / ROUNDING.step) * ROUNDING.step).toFixed(decimals));
  }
  return Number(value.toFixed(ROUNDING.places));
}

async function resolveOracle() {
  const sources = [];
  const body = await fetchJson(SOURCE_URL, sources);
  const raw = Number(readField(body, FIELD));
  if (!Number.isFinite(raw)) throw new Error("field " + FIELD + " is not numeric");
  return { value: round(raw), sources };
}

${RUNNER}
`;
  },
};

const TEMPLATES = new Map<string, ResolutionTemplate>([
  [priceThreshold.id, priceThreshold],
  [numericValue.id, numericValue],
]);

export function getTemplate(id: string): ResolutionTemplate | undefined {
  return TEMPLATES.get(id);
}

export function templateIds(): string[] {
  return [...TEMPLATES.keys()];
}

/** The rendered template the rules ask for, or null when code must be generated instead. */
export function selectTemplate(rules: ResolutionRules): { id: string; code: string } | null {
  if (!rules.template) return null;
  const template = getTemplate(rules.template);
  if (!template) {
    console.warn(`[Executor] Unknown template "${rules.template}", falling back to generation`);
    return null;
  }
  const code = template.render(rules);
  if (code === null) {
    console.warn(`[Executor] Template "${template.id}" cannot be rendered from these rules, falling back to generation`);
    return null;
  }
  return { id: template.id, code };
}
