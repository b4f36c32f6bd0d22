/**
 * TradeGenerator — prints scattered around its own random-walk mid.
 * Gaps between prints are uniform integers in [100, 1000] ms (mean ~550 ms).
 */

import { FixtureGenerator, GenerationResult, SeriesOpts } from "./Generator";
import { MidPriceWalk } from "./MidPriceWalk";
import { roundPrice, roundQty } from "../util/price";
import { TRADE_COLUMNS, TradePrint } from "../util/types";

export const TRADE_GAP_MIN_MS = 100;
export const TRADE_GAP_MAX_MS = 1000;
export const PRICE_JITTER = 2; // ± around mid
export const TRADE_QTY_MIN = 0.01;
export const TRADE_QTY_MAX = 1.0;

export class TradeGenerator extends FixtureGenerator<TradePrint> {
  readonly columns = TRADE_COLUMNS;

  constructor(opts: SeriesOpts) {
    super("trade", opts);
  }

  *rows(): Generator<TradePrint> {
    const walk = new MidPriceWalk(this.rng);
    let tradeId = 1;
    let t = this.startMs;

    while (t < this.endMs) {
      const mid = walk.step();
      const price = roundPrice(mid + this.rng.between(-PRICE_JITTER, PRICE_JITTER));
      const quantity = roundQty(this.rng.between(TRADE_QTY_MIN, TRADE_QTY_MAX));
      const isBuyerMaker = this.rng.coin();

      yield {
        timestamp_ms: t,
        symbol: this.symbol,
        trade_id: tradeId++,
        price,
        quantity,
        is_buyer_maker: isBuyerMaker,
      };

      t += this.rng.int(TRADE_GAP_MIN_MS, TRADE_GAP_MAX_MS);
    }
  }
}

export function tradePrints(opts: SeriesOpts): Generator<TradePrint> {
  return new TradeGenerator(opts).rows();
}

export function generateTrades(opts: SeriesOpts, file: string): GenerationResult {
  return new TradeGenerator(opts).generate(file);
}
