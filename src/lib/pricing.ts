import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod/v4";
import { ConfigError } from "./errors";

const modelPriceSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

const pricingSchema = z.object({
  currency: z.string().default("USD"),
  unit: z.literal("per_million_tokens").default("per_million_tokens"),
  models: z.record(z.string(), modelPriceSchema),
});

export type PricingTable = z.infer<typeof pricingSchema>;

export const EMPTY_PRICING: PricingTable = {
  currency: "USD",
  unit: "per_million_tokens",
  models: {},
};

export function parsePricing(json: unknown): PricingTable {
  const result = z.safeParse(pricingSchema, json);
  if (!result.success) {
    throw new ConfigError(
      ["PRICING_FILE"],
      `Invalid pricing table: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
    );
  }
  return result.data;
}

/** Load a pricing table, resolving relative paths against the working directory. */
export function loadPricing(filePath: string): PricingTable {
  const fullPath = resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = readFileSync(fullPath, "utf-8");
  } catch (error) {
    console.warn(
      `[Pricing] Could not read ${fullPath}, costs will be recorded as 0:`,
      error instanceof Error ? error.message : error
    );
    return EMPTY_PRICING;
  }
  return parsePricing(JSON.parse(raw));
}

const warnedModels = new Set<string>();

/**
 * Cost in the table's currency. Prices are per million tokens. A model
 * missing from the table costs 0 and is warned about once.
 */
export function computeCost(
  pricing: PricingTable,
  model: string,
  inputTokens: number,
  outputTokens: number
): number {
  const price = pricing.models[model];
  if (!price) {
    if (!warnedModels.has(model)) {
      warnedModels.add(model);
      console.warn(`[Pricing] No price configured for model "${model}", recording cost 0`);
    }
    return 0;
  }
  return (inputTokens * price.input + outputTokens * price.output) / 1_000_000;
}
