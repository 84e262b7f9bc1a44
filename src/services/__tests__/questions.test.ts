import { afterEach, describe, it, expect, vi } from "vitest";
import { hexlify, toUtf8Bytes } from "ethers";
import { parseRules } from "../ancillary";
import { DIA_BTC_URL, buildThresholdQuestion, fetchPrice, randomThreshold } from "../questions";
import { selectTemplate } from "../templates";

describe("randomThreshold", () => {
  it("moves the base by up to the spread in either direction", () => {
    expect(randomThreshold(100, 0.1, () => 0)).toBeCloseTo(90);
    expect(randomThreshold(100, 0.1, () => 0.5)).toBeCloseTo(100);
    expect(randomThreshold(100, 0.1, () => 1)).toBeCloseTo(110);
  });
});

describe("buildThresholdQuestion", () => {
  it("produces ancillary text the price-threshold template can resolve", () => {
    const text = buildThresholdQuestion(65000);
    const rules = parseRules(hexlify(toUtf8Bytes(text)));

    expect(rules.kind).toBe("binary");
    expect(rules.template).toBe("price-threshold");
    expect(rules.threshold).toEqual({ comparator: ">", value: 65000 });
    expect(rules.params).toEqual({ field: "Price" });
    expect(rules.sources).toEqual([DIA_BTC_URL]);
    expect(rules.allowedHosts).toEqual(["api.diadata.org"]);
    expect(selectTemplate(rules)?.id).toBe("price-threshold");
  });
});

describe("fetchPrice", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads either price field spelling", async () => {
    const fetchMock = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(new Response(JSON.stringify({ Price: 65000.5 })))
      .mockResolvedValueOnce(new Response(JSON.stringify({ price: 3000 })));

    await expect(fetchPrice("https://prices.example.com/btc")).resolves.toBe(65000.5);
    await expect(fetchPrice("https://prices.example.com/eth")).resolves.toBe(3000);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("reports a failed response", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(new Response("rate limited", { status: 429 }));
    await expect(fetchPrice("https://prices.example.com/btc")).rejects.toThrow("Price fetch failed (429): rate limited");
  });
});
