import { describe, it, expect } from "vitest";
import { hexlify, toUtf8Bytes } from "ethers";
import {
  computeRequestId,
  decodeAncillary,
  deriveSchedule,
  parseRounding,
  parseRules,
  parseThreshold,
  restorePlaceholders,
  sanitizeAncillary,
} from "../ancillary";
import { IDENTIFIER } from "./fakes";

const hex = (text: string) => hexlify(toUtf8Bytes(text));

describe("computeRequestId", () => {
  it("is deterministic in identifier, timestamp and ancillary data", () => {
    const a = computeRequestId(IDENTIFIER, 1_700_000_000, hex("q"));
    expect(computeRequestId(IDENTIFIER, 1_700_000_000, hex("q"))).toBe(a);
    expect(computeRequestId(IDENTIFIER, 1_700_000_001, hex("q"))).not.toBe(a);
    expect(computeRequestId(IDENTIFIER, 1_700_000_000, hex("q2"))).not.toBe(a);
    expect(a).toMatch(/^0x[0-9a-f]{64}$/);
  });
});

describe("decodeAncillary", () => {
  it("decodes UTF-8 bytes", () => {
    expect(decodeAncillary(hex("hello"))).toBe("hello");
    expect(decodeAncillary("0x")).toBe("");
  });

  it("falls back to the hex text for invalid UTF-8", () => {
    expect(decodeAncillary("0xff")).toBe("0xff");
  });
});

describe("parseRules", () => {
  it("reads key: value lines and keeps prose as the description", () => {
    const rules = parseRules(
      hex(
        [
          "Will the policy rate rise by more than 25bps?",
          "type: numeric",
          "rounding: step:0.25",
          "min: 0",
          "max: 10",
          "resolveAfter: 1700000000",
          "deadline: 2023-11-14T23:13:20Z",
          "sources: https://example.com/rates, https://example.org/fed",
          "series: FEDFUNDS",
        ].join("\n")
      )
    );

    expect(rules.description).toBe("Will the policy rate rise by more than 25bps?");
    expect(rules.kind).toBe("numeric");
    expect(rules.rounding).toEqual({ kind: "step", step: 0.25 });
    expect(rules.range).toEqual({ min: 0, max: 10 });
    expect(rules.resolveAfter).toBe(1_700_000_000_000);
    expect(rules.deadline).toBe(1_700_003_600_000);
    expect(rules.sources).toEqual(["https://example.com/rates", "https://example.org/fed"]);
    expect(rules.allowedHosts).toEqual(["example.com", "example.org"]);
    expect(rules.params).toEqual({ series: "FEDFUNDS" });
    expect(rules.template).toBeNull();
  });

  it("reads a JSON object", () => {
    const rules = parseRules(
      hex(
        JSON.stringify({
          q: "Is ETH above 3000?",
          template: "price-threshold",
          threshold: ">= 3000",
          sources: ["https://api.example.com/eth"],
          field: "usd",
        })
      )
    );

    expect(rules.description).toBe("Is ETH above 3000?");
    expect(rules.kind).toBe("binary");
    expect(rules.template).toBe("price-threshold");
    expect(rules.threshold).toEqual({ comparator: ">=", value: 3000 });
    expect(rules.sources).toEqual(["https://api.example.com/eth"]);
    expect(rules.params).toEqual({ field: "usd" });
  });

  it("takes sources from URLs in the text when none are listed", () => {
    const rules = parseRules(hex("Resolve YES if https://api.example.com/price is above 5. See https://example.com/data."));
    expect(rules.sources).toEqual(["https://api.example.com/price", "https://example.com/data"]);
    expect(rules.allowedHosts).toEqual(["api.example.com", "example.com"]);
    expect(rules.kind).toBe("binary");
  });
});

describe("rule fragments", () => {
  it("parses thresholds", () => {
    expect(parseThreshold("<= -1.5")).toEqual({ comparator: "<=", value: -1.5 });
    expect(parseThreshold("> 100")).toEqual({ comparator: ">", value: 100 });
    expect(parseThreshold("around 5")).toBeNull();
  });

  it("parses rounding policies", () => {
    expect(parseRounding("0.25")).toEqual({ kind: "step", step: 0.25 });
    expect(parseRounding("decimals:2")).toEqual({ kind: "decimals", places: 2 });
    expect(parseRounding("decimals:1.5")).toBeNull();
    expect(parseRounding("step:-1")).toBeNull();
    expect(parseRounding("banker:2")).toBeNull();
  });
});

describe("deriveSchedule", () => {
  const policy = { settlementGraceMs: 60_000, defaultDeadlineWindowMs: 3_600_000 };

  it("defaults eligibility to the request time plus grace", () => {
    const rules = parseRules(hex("Will it rain?"));
    expect(deriveSchedule(rules, 1_000_000, policy)).toEqual({
      earliestResolveTime: 1_060_000,
      deadline: 4_660_000,
    });
  });

  it("prefers times stated in the ancillary data", () => {
    const rules = parseRules(hex("Will it rain?\nresolveAfter: 2000\ndeadline: 3000"));
    expect(deriveSchedule(rules, 1_000_000, policy)).toEqual({
      earliestResolveTime: 2_000_000,
      deadline: 3_000_000,
    });
  });
});

describe("placeholders", () => {
  const literal = "0x" + "ab".repeat(32);

  it("swaps long hex literals for tokens and restores them", () => {
    const { sanitized, placeholders } = sanitizeAncillary(`market ${literal} or 0xdeadbeef`);
    expect(sanitized).toBe("market __PLACEHOLDER_HEX_1__ or 0xdeadbeef");
    expect(placeholders).toHaveLength(1);
    expect(placeholders[0].constName).toBe("PLACEHOLDER_HEX_1");
    expect(placeholders[0].value).toBe(literal);

    const code = `const PLACEHOLDER_HEX_1 = "__PLACEHOLDER_HEX_1__";`;
    expect(restorePlaceholders(code, placeholders)).toBe(`const PLACEHOLDER_HEX_1 = "${literal}";`);
  });
});
