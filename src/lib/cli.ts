import { InvalidArgumentError } from "commander";
import type { CatalogSource } from "./catalog";
import { isRunPreset, parseDateRange, resolvePreset, RUN_PRESETS } from "./config";
import type { DateRange, PipelineConfig, RunPreset } from "./config";
import { isIsoDate } from "./dates";
import { strategyByName } from "./strategies";
import type { DateStrategy } from "./strategies";
import { TmdbCatalog } from "./tmdb";
import type { IsoDate } from "./types";

// Option parsers for the scripts. commander reports the thrown message.

export function parsePreset(value: string): RunPreset {
  if (!isRunPreset(value)) {
    throw new InvalidArgumentError(`Preset must be one of ${RUN_PRESETS.join(", ")}`);
  }
  return value;
}

export function parseIsoDateArg(value: string): IsoDate {
  if (!isIsoDate(value)) throw new InvalidArgumentError("Must be a YYYY-MM-DD date");
  return value;
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new InvalidArgumentError("Must be a positive integer");
  }
  return Number(value);
}

export function parseStrategy(value: string): DateStrategy {
  try {
    return strategyByName(value);
  } catch (err) {
    throw new InvalidArgumentError((err as Error).message);
  }
}

/** `--start/--end` win over `--preset`; with neither, the `test` preset. */
export function resolveRange(
  options: { preset?: RunPreset; start?: IsoDate; end?: IsoDate },
  now: Date = new Date(),
): DateRange {
  if (options.start || options.end) {
    const fallback = resolvePreset(options.preset ?? "test", now);
    return parseDateRange(options.start ?? fallback.start, options.end ?? fallback.end);
  }
  return resolvePreset(options.preset ?? "test", now);
}

/** The TMDB catalog when configured, else `dbCatalog`. */
export function selectCatalog(config: PipelineConfig, dbCatalog: CatalogSource): CatalogSource {
  if (config.catalogSource !== "tmdb") return dbCatalog;
  if (!config.tmdbKey) throw new Error("CATALOG_SOURCE=tmdb requires TMDB_API_KEY");
  return new TmdbCatalog(config.tmdbKey);
}
