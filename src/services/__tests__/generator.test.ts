import { describe, it, expect } from "vitest";
import { hexlify, toUtf8Bytes } from "ethers";
import { parseRules, sanitizeAncillary } from "../ancillary";
import {
  GeminiCodeGenerator,
  GeneratorSettings,
  OpenAICodeGenerator,
  analyzeCode,
  createCodeGenerator,
  extractCode,
} from "../generator";
import { buildResolutionPrompt } from "../prompts";
import { getTemplate, selectTemplate, templateIds } from "../templates";

const rulesFrom = (text: string) => parseRules(hexlify(toUtf8Bytes(text)));

const SETTINGS: GeneratorSettings = {
  provider: "openai",
  model: "qwen2.5-coder:7b",
  baseUrl: "http://localhost:11434/v1",
  apiKey: "test-key",
  geminiApiKey: "test-key",
  temperature: 0.3,
  maxTokens: 2000,
};

describe("extractCode", () => {
  it("takes the first fenced block", () => {
    expect(extractCode("Sure:\n```javascript\nconst a = 1;\n```\nmore text")).toBe("const a = 1;");
  });

  it("strips an unterminated fence", () => {
    expect(extractCode("```js\nconst a = 1;")).toBe("const a = 1;");
  });

  it("returns bare code unchanged", () => {
    expect(extractCode("  const a = 1;\n")).toBe("const a = 1;");
  });
});

describe("analyzeCode", () => {
  it("accepts a well-formed script", () => {
    const code = [
      'const crypto = require("crypto");',
      "async function resolveOracle() {",
      '  const hash = crypto.createHash("sha256").update("body").digest("hex");',
      "  return { decision: true, sources: [{ url: \"https://a.example.com\", hash }] };",
      "}",
      "resolveOracle().then((r) => console.log(JSON.stringify(r)));",
    ].join("\n");
    expect(analyzeCode(code)).toEqual({ ok: true, issues: [], warnings: [] });
  });

  it("rejects empty code", () => {
    expect(analyzeCode("   ")).toEqual({ ok: false, issues: ["empty code"], warnings: [] });
  });

  it("rejects forbidden modules", () => {
    const code = [
      'const { execSync } = require("node:child_process");',
      'import fs from "fs";',
      "const resolveOracle = async () => { return {}; };",
      "console.log(JSON.stringify(await resolveOracle()));",
      "// createHash",
    ].join("\n");
    expect(analyzeCode(code)).toEqual({
      ok: false,
      issues: ["uses forbidden module child_process", "uses forbidden module fs"],
      warnings: [],
    });
  });

  it("warns about output, placeholders and hashing without rejecting", () => {
    const code = 'async function resolveOracle() { return { id: "__PLACEHOLDER_HEX_2__" }; }';
    expect(analyzeCode(code)).toEqual({
      ok: true,
      issues: [],
      warnings: [
        "prints nothing; relying on the return value",
        "unrestored placeholder token",
        "does not hash its sources",
      ],
    });
  });
});

describe("createCodeGenerator", () => {
  it("picks the client for the configured provider", () => {
    const openai = createCodeGenerator(SETTINGS);
    expect(openai).toBeInstanceOf(OpenAICodeGenerator);
    expect(openai.model).toBe("qwen2.5-coder:7b");

    const gemini = createCodeGenerator({ ...SETTINGS, provider: "gemini", model: "gemini-2.5-flash" });
    expect(gemini).toBeInstanceOf(GeminiCodeGenerator);
    expect(gemini.model).toBe("gemini-2.5-flash");
  });
});

describe("templates", () => {
  it("lists the vetted templates", () => {
    expect(templateIds()).toEqual(["price-threshold", "numeric-value"]);
    expect(getTemplate("nope")).toBeUndefined();
  });

  it("renders a price threshold script that passes analysis", () => {
    const rules = rulesFrom(
      "Is BTC above 50000?\ntemplate: price-threshold\nthreshold: >= 50000\nsources: https://api.example.com/btc"
    );
    const selected = selectTemplate(rules);

    expect(selected?.id).toBe("price-threshold");
    const code = selected?.code ?? "";
    expect(code).toContain('const SOURCE_URL = "https://api.example.com/btc";');
    expect(code).toContain('const FIELD = "price";');
    expect(code).toContain('const COMPARATOR = ">=";');
    expect(analyzeCode(code)).toEqual({ ok: true, issues: [], warnings: [] });
  });

  it("defaults numeric rounding to six decimals", () => {
    const rules = rulesFrom(
      "ETH price?\ntype: numeric\ntemplate: numeric-value\nsources: https://api.example.com/eth\npath: data.usd"
    );
    const code = selectTemplate(rules)?.code ?? "";
    expect(code).toContain('const FIELD = "data.usd";');
    expect(code).toContain('const ROUNDING = {"kind":"decimals","places":6};');
  });

  it("falls back to generation when a template cannot be used", () => {
    expect(selectTemplate(rulesFrom("Will it rain?"))).toBeNull();
    expect(selectTemplate(rulesFrom("Will it rain?\ntemplate: weather-v2"))).toBeNull();
    expect(selectTemplate(rulesFrom("Is BTC up?\ntemplate: price-threshold\nsources: https://a.example.com"))).toBeNull();
  });
});

describe("buildResolutionPrompt", () => {
  it("states the output contract and constraints", () => {
    const rules = rulesFrom(
      "Fed funds rate?\ntype: numeric\nrounding: step:0.25\nmin: 0\nmax: 20\nsources: https://rates.example.com"
    );
    const { sanitized, placeholders } = sanitizeAncillary(rules.text);
    const prompt = buildResolutionPrompt({
      requestId: "0xr",
      identifier: "0xid",
      requestTimestamp: 1_700_000_000_999,
      rules,
      sanitized,
      placeholders,
    });

    expect(prompt).toContain('"timestamp": 1700000000');
    expect(prompt).toContain("It must lie within [0, 20]. Round it to a multiple of 0.25.");
    expect(prompt).toContain("- Fetch data only from: https://rates.example.com");
    expect(prompt).not.toContain("The previous script failed.");
  });

  it("declares placeholder constants and includes the previous failure", () => {
    const literal = "0x" + "ef".repeat(20);
    const rules = rulesFrom(`Was ${literal} funded?\nthreshold: > 0`);
    const { sanitized, placeholders } = sanitizeAncillary(rules.text);
    const prompt = buildResolutionPrompt({
      requestId: "0xr",
      identifier: "0xid",
      requestTimestamp: 0,
      rules,
      sanitized,
      placeholders,
      previous: { code: "throw 1", error: "Uncaught 1" },
    });

    expect(prompt).toContain("- Resolve true when the observed value is > 0.");
    expect(prompt).toContain('  const PLACEHOLDER_HEX_1 = "__PLACEHOLDER_HEX_1__"; // 0xefefefef…efefef (length 42)');
    expect(prompt).toContain("Previous script:\nthrow 1\n\nError:\nUncaught 1");
  });
});
