import fs from "fs";

import { FixtureConfig, FixturePaths, fixturePaths } from "./config";
import { GenerationResult } from "./generators/Generator";
import { generateOrderbook } from "./generators/OrderbookGenerator";
import { generateTrades } from "./generators/TradeGenerator";
import { RNG } from "./util/rng";
import { Ms, dayBefore } from "./util/time";

export type GenerateFixturesOpts = {
  // wall clock of the run; the window starts one day earlier
  now?: Ms;
  // fixes both series; unseeded runs draw from entropy
  seed?: string;
};

export type FixtureReport = {
  paths: FixturePaths;
  startMs: Ms;
  orderbook: GenerationResult;
  trades: GenerationResult;
};

/**
 * Writes the orderbook file, then the trades file. Each series gets its own RNG.
 * Filesystem errors are not caught.
 */
export function generateFixtures(cfg: FixtureConfig, opts: GenerateFixturesOpts = {}): FixtureReport {
  fs.mkdirSync(cfg.outputDir, { recursive: true });

  const startMs = dayBefore(opts.now ?? Date.now());
  const paths = fixturePaths(cfg);
  const rngFor = (series: string) => new RNG(opts.seed === undefined ? undefined : `${opts.seed}:${series}`);

  console.log(`Generating ${cfg.hours} hours of sample data for ${cfg.symbol}...`);

  const orderbook = generateOrderbook({ symbol: cfg.symbol, startMs, hours: cfg.hours, rng: rngFor("orderbook") }, paths.orderbook);
  const trades = generateTrades({ symbol: cfg.symbol, startMs, hours: cfg.hours, rng: rngFor("trades") }, paths.trades);

  return { paths, startMs, orderbook, trades };
}
