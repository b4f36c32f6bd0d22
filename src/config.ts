import path from "path";
import { InvalidArgumentError } from "commander";

export type FixtureConfig = {
  symbol: string;
  hours: number;
  outputDir: string;
};

export type FixturePaths = {
  orderbook: string;
  trades: string;
};

export const DEFAULTS: FixtureConfig = {
  symbol: "BTCUSDT",
  hours: 24,
  outputDir: "./data",
};

/** commander argument parser for --hours */
export function parseHours(value: string): number {
  const s = value.trim();
  if (!/^[+-]?\d+$/.test(s)) {
    throw new InvalidArgumentError(`Expected an integer number of hours, got "${value}".`);
  }
  return parseInt(s, 10);
}

/** effective settings: CLI values over defaults */
export function resolveConfig(opts: Partial<FixtureConfig> = {}): FixtureConfig {
  return {
    symbol: opts.symbol ?? DEFAULTS.symbol,
    hours: opts.hours ?? DEFAULTS.hours,
    outputDir: opts.outputDir ?? DEFAULTS.outputDir,
  };
}

/** <dir>/<symbol>_orderbook.csv and <dir>/<symbol>_trades.csv, symbol lowercased */
export function fixturePaths(cfg: FixtureConfig): FixturePaths {
  const base = cfg.symbol.toLowerCase();
  return {
    orderbook: path.join(cfg.outputDir, `${base}_orderbook.csv`),
    trades: path.join(cfg.outputDir, `${base}_trades.csv`),
  };
}
