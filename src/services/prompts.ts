import { Placeholder, ResolutionRules } from "./ancillary";

export const SYSTEM_PROMPT =
  "You are an elite JavaScript engineer. Respond with a single runnable Node.js 20 script that strictly " +
  "follows the user's instructions. Do not add markdown, explanations or commentary. Return raw code only.";

export interface PromptInput {
  requestId: string;
  identifier: string;
  requestTimestamp: number;
  rules: ResolutionRules;
  sanitized: string;
  placeholders: Placeholder[];
  previous?: { code: string; error: string };
}

function outputContract(rules: ResolutionRules): string {
  if (rules.kind === "numeric") {
    const range = rules.range ? ` It must lie within [${rules.range.min}, ${rules.range.max}].` : "";
    const rounding = !rules.rounding
      ? ""
      : rules.rounding.kind === "step"
        ? ` Round it to a multiple of ${rules.rounding.step}.`
        : ` Round it to ${rules.rounding.places} decimal places.`;
    return `{"value": <number>, "sources": [{"url": "<url>", "hash": "0x<sha256 of the response body>"}]}.${range}${rounding}`;
  }
  return `{"decision": true | false | "invalid", "value": <number or null>, "sources": [{"url": "<url>", "hash": "0x<sha256 of the response body>"}], "reason": "<one sentence>"}. Use "invalid" only when the question cannot be answered from the sources.`;
}

/** The prompt is a pure function of the request, so the same request always asks the same question. */
export function buildResolutionPrompt(input: PromptInput): string {
  const { rules } = input;
  const lines = [
    "Write a Node.js 20 script that resolves the following oracle question.",
    "",
    `Question:\n${input.sanitized}`,
    "",
    "Request:",
    JSON.stringify(
      {
        requestId: input.requestId,
        identifier: input.identifier,
        timestamp: Math.floor(input.requestTimestamp / 1000),
      },
      null,
      2
    ),
    "",
    "Requirements:",
    "- Define an async function named resolveOracle() that returns the result object.",
    "- Call resolveOracle() at the end, print the result with console.log(JSON.stringify(result)) and exit with code 1 on error.",
    "- Use only the global fetch and the built-in crypto module. No other packages are installed.",
    "- Hash every response body you rely on with crypto.createHash(\"sha256\") and list it in sources.",
    `- Print exactly one JSON line of the form ${outputContract(rules)}`,
  ];

  if (rules.sources.length > 0) {
    lines.push(`- Fetch data only from: ${rules.sources.join(", ")}`);
  }
  if (rules.threshold) {
    lines.push(`- Resolve true when the observed value is ${rules.threshold.comparator} ${rules.threshold.value}.`);
  }
  if (input.placeholders.length > 0) {
    lines.push("- The question contains placeholder tokens. Declare a constant for each and use the constant:");
    for (const p of input.placeholders) {
      lines.push(`  const ${p.constName} = "${p.token}"; // ${p.description}`);
    }
  }

  if (input.previous) {
    lines.push(
      "",
      "The previous script failed. Generate a corrected version.",
      "Previous script:",
      input.previous.code,
      "",
      `Error:\n${input.previous.error}`
    );
  }

  return lines.join("\n");
}
