/**
 * Per-symbol strategy configuration.
 *
 * The symbols file is a non-empty JSON array, one object per instrument:
 *
 *   [{ "instrument": "BTC_USDT_Perp", "order_notional_usdt": 500,
 *      "position_mode": "increase", "a_side_when_equal": "buy" }]
 *
 * Instrument names are normalized against the exchange's active instrument
 * list when it is available.
 */

import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import Decimal from "decimal.js";
import { z } from "zod";
import { ConfigError } from "./config";
import type { SymbolConfig } from "../strategy/types";
import type { Logger } from "../logging/logger";
import { parseDecimal, toDecimal } from "../utils/decimal";

/** Maps exact, upper-case and lower-case spellings to the canonical name */
export type InstrumentAliasMap = Map<string, string>;

const MAX_SUGGESTIONS = 6;

const decimalInput = z
  .union([z.string(), z.number()])
  .refine((value) => parseDecimal(value) !== null, "must be a finite number")
  .optional();

const symbolEntrySchema = z.object({
  instrument: z
    .string({ required_error: "Symbol config missing instrument" })
    .trim()
    .min(1, "Symbol config missing instrument"),
  enabled: z.boolean().default(true),
  order_notional_usdt: decimalInput,
  imbalance_limit_usdt: decimalInput,
  max_total_position_usdt: decimalInput,
  min_total_position_usdt: decimalInput,
  a_side_when_equal: z.string().trim().toLowerCase().default("buy"),
  position_mode: z.string().trim().toLowerCase().default("increase"),
});

const symbolsFileSchema = z
  .array(z.unknown(), { invalid_type_error: "Symbols config file must be a non-empty JSON array" })
  .min(1, "Symbols config file must be a non-empty JSON array");

type SymbolEntry = z.infer<typeof symbolEntrySchema>;

/**
 * Build the alias map from the exchange's instrument names.
 */
export function buildInstrumentAliasMap(names: Iterable<string>): InstrumentAliasMap {
  const alias: InstrumentAliasMap = new Map();
  for (const raw of names) {
    const name = raw.trim();
    if (!name) continue;
    alias.set(name, name);
    alias.set(name.toUpperCase(), name);
    alias.set(name.toLowerCase(), name);
  }
  return alias;
}

/**
 * Canonical instrument name, or "" when the alias map does not know it.
 * A trailing "_PERP" in any case is rewritten to "_Perp" first. Without an
 * alias map the normalized input is returned unchanged.
 */
export function resolveInstrumentName(raw: string, aliasMap: InstrumentAliasMap): string {
  let instrument = raw.trim();
  if (!instrument) return "";
  if (instrument.toUpperCase().endsWith("_PERP")) {
    instrument = `${instrument.slice(0, -5)}_Perp`;
  }
  if (aliasMap.size === 0) return instrument;
  return (
    aliasMap.get(instrument) ??
    aliasMap.get(instrument.toUpperCase()) ??
    aliasMap.get(instrument.toLowerCase()) ??
    ""
  );
}

/**
 * Known instruments that share the base token of `raw`: prefix matches
 * first, then names containing the token.
 */
export function suggestInstruments(
  raw: string,
  aliasMap: InstrumentAliasMap,
  limit: number = MAX_SUGGESTIONS
): string[] {
  if (aliasMap.size === 0) return [];
  const canonical = [...new Set(aliasMap.values())].sort();
  const token = (raw.trim().split("_")[0] ?? "").toUpperCase();
  if (!token) return canonical.slice(0, limit);

  const prefix = `${token}_`;
  const suggestions = canonical.filter((name) => name.toUpperCase().startsWith(prefix));
  if (suggestions.length < limit) {
    for (const name of canonical) {
      if (name.toUpperCase().includes(token) && !suggestions.includes(name)) {
        suggestions.push(name);
      }
      if (suggestions.length >= limit) break;
    }
  }
  return suggestions.slice(0, limit);
}

function toSymbolConfig(entry: SymbolEntry, instrument: string): SymbolConfig {
  const side = entry.a_side_when_equal;
  if (side !== "buy" && side !== "sell") {
    throw new ConfigError(`${instrument} invalid a_side_when_equal: ${side}`);
  }
  const mode = entry.position_mode;
  if (mode !== "increase" && mode !== "decrease") {
    throw new ConfigError(`${instrument} invalid position_mode: ${mode}`);
  }

  const orderNotional = toDecimal(entry.order_notional_usdt, new Decimal(1000));
  const imbalanceLimit = toDecimal(entry.imbalance_limit_usdt, new Decimal(1000));
  if (orderNotional.lte(0)) {
    throw new ConfigError(`${instrument} invalid order_notional_usdt: ${orderNotional}`);
  }
  if (imbalanceLimit.lt(0)) {
    throw new ConfigError(`${instrument} invalid imbalance_limit_usdt: ${imbalanceLimit}`);
  }

  const maxTotal = toDecimal(entry.max_total_position_usdt, new Decimal(20000));
  const minTotal = toDecimal(entry.min_total_position_usdt, new Decimal(0));
  if (maxTotal.lt(0)) {
    throw new ConfigError(`${instrument} invalid max_total_position_usdt: ${maxTotal}`);
  }
  if (minTotal.lt(0)) {
    throw new ConfigError(`${instrument} invalid min_total_position_usdt: ${minTotal}`);
  }
  if (minTotal.gt(maxTotal)) {
    throw new ConfigError(
      `${instrument} min_total_position_usdt > max_total_position_usdt: ${minTotal} > ${maxTotal}`
    );
  }

  return {
    instrument,
    enabled: entry.enabled,
    orderNotional,
    imbalanceLimit,
    maxTotalPosition: maxTotal,
    minTotalPosition: minTotal,
    aSideWhenEqual: side,
    positionMode: mode,
  };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid value";
  const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${path}${issue.message}`;
}

/**
 * Validate parsed symbols JSON and resolve instrument names.
 * Later entries for the same instrument replace earlier ones.
 */
export function parseSymbolConfigs(
  data: unknown,
  aliasMap: InstrumentAliasMap,
  logger?: Logger
): SymbolConfig[] {
  const list = symbolsFileSchema.safeParse(data);
  if (!list.success) {
    throw new ConfigError(firstIssue(list.error));
  }

  const byInstrument = new Map<string, SymbolConfig>();
  for (const item of list.data) {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new ConfigError("Each symbol config must be an object");
    }
    const parsed = symbolEntrySchema.safeParse(item);
    if (!parsed.success) {
      throw new ConfigError(firstIssue(parsed.error));
    }

    const rawInstrument = parsed.data.instrument;
    const instrument = resolveInstrumentName(rawInstrument, aliasMap);
    if (!instrument) {
      const suggestions = suggestInstruments(rawInstrument, aliasMap);
      const suffix = suggestions.length > 0 ? `, maybe: ${suggestions.join(", ")}` : "";
      throw new ConfigError(`Unknown instrument '${rawInstrument}'${suffix}`);
    }
    if (instrument !== rawInstrument) {
      logger?.info(`[CONFIG] Normalized instrument ${rawInstrument} -> ${instrument}`);
    }
    byInstrument.set(instrument, toSymbolConfig(parsed.data, instrument));
  }
  return [...byInstrument.values()];
}

/**
 * Read and validate the symbols file. Relative paths resolve against the
 * working directory.
 */
export function loadSymbolConfigs(
  filePath: string,
  aliasMap: InstrumentAliasMap,
  logger?: Logger
): SymbolConfig[] {
  const fullPath = isAbsolute(filePath) ? filePath : resolve(process.cwd(), filePath);

  let text: string;
  try {
    text = readFileSync(fullPath, "utf-8");
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read symbols config file (${fullPath}): ${msg}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid symbols config JSON (${fullPath}): ${msg}`);
  }

  return parseSymbolConfigs(data, aliasMap, logger);
}
