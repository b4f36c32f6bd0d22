import { Command } from "commander";

import { DEFAULTS, FixtureConfig, parseHours, resolveConfig } from "./config";
import { generateFixtures } from "./fixtures";

type CliOpts = Partial<FixtureConfig>;

export function createProgram(): Command {
  const program = new Command();

  program
    .name("market-fixtures")
    .description("Generate sample orderbook and trade CSV data for backtesting")
    .option("--symbol <symbol>", "trading symbol", DEFAULTS.symbol)
    .option("--hours <n>", "duration in hours", parseHours, DEFAULTS.hours)
    .option("--output-dir <path>", "output directory", DEFAULTS.outputDir)
    .action(() => {
      const cfg = resolveConfig(program.opts<CliOpts>());
      generateFixtures(cfg);

      console.log("\nDone! Run backtest with:");
      console.log("  mm_backtest");
    });

  return program;
}
