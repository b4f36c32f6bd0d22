import { writeCsv } from "../util/csv";
import { RNG } from "../util/rng";
import { CsvValue } from "../util/types";
import { Ms, windowEnd } from "../util/time";

export type SeriesOpts = {
  symbol: string;
  startMs: Ms;
  hours: number;
  rng: RNG;
};

export type GenerationResult = {
  file: string;
  rows: number;
};

export abstract class FixtureGenerator<R extends Record<keyof R, CsvValue>> {
  readonly label: string;
  protected symbol: string;
  protected startMs: Ms;
  protected endMs: Ms;
  protected rng: RNG;

  abstract readonly columns: readonly (keyof R & string)[];

  constructor(label: string, opts: SeriesOpts) {
    this.label = label;
    this.symbol = opts.symbol;
    this.startMs = opts.startMs;
    this.endMs = windowEnd(opts.startMs, opts.hours);
    this.rng = opts.rng;
  }

  /** rows covering [startMs, endMs); each call starts a fresh walk */
  abstract rows(): Generator<R>;

  generate(file: string): GenerationResult {
    const rows = writeCsv<R>(file, this.columns, this.rows());
    console.log(`Generated ${this.label} data: ${file} (${rows} rows)`);
    return { file, rows };
  }
}
