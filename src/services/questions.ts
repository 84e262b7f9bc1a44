import { z } from "zod";

export const DIA_BTC_URL =
  "https://api.diadata.org/v1/assetQuotation/Bitcoin/0x0000000000000000000000000000000000000000";

const PriceResponseSchema = z.union([
  z.object({ Price: z.number() }).transform((d) => d.Price),
  z.object({ price: z.number() }).transform((d) => d.price),
]);

export async function fetchPrice(url: string): Promise<number> {
  const response = await fetch(url, { signal: AbortSignal.timeout(10_000) });
  if (!response.ok) {
    throw new Error(`Price fetch failed (${response.status}): ${(await response.text()).slice(0, 200)}`);
  }
  return PriceResponseSchema.parse(await response.json());
}

/** `base` moved by a uniform fraction in [-spread, spread]. */
export function randomThreshold(base: number, spread: number, random: () => number = Math.random): number {
  const delta = (random() * 2 - 1) * spread;
  return base * (1 + delta);
}

/** Ancillary text for "is BTC above X", resolvable by the price-threshold template. */
export function buildThresholdQuestion(threshold: number, sourceUrl: string = DIA_BTC_URL): string {
  const formatted = threshold.toFixed(2);
  return [
    `Is BTC price above ${formatted}? Resolve YES if the USD price reported by DiaData is greater than ${formatted} at the reported timestamp.`,
    "type: binary",
    "template: price-threshold",
    `threshold: > ${formatted}`,
    "field: Price",
    `sources: ${sourceUrl}`,
  ].join("\n");
}
