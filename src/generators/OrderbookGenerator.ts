/**
 * OrderbookGenerator — fixed-cadence top-3 snapshots around a random-walk mid.
 *  - one snapshot every 100 ms over the window
 *  - spread ~ U(1, 5), levels 2/3 step 1.0 away from the touch
 *  - per-level size ranges, same on both sides
 */

import { FixtureGenerator, GenerationResult, SeriesOpts } from "./Generator";
import { MidPriceWalk } from "./MidPriceWalk";
import { roundPrice, roundQty } from "../util/price";
import { ORDERBOOK_COLUMNS, OrderbookSnapshot, Side } from "../util/types";

export const SNAPSHOT_INTERVAL_MS = 100;
export const SPREAD_MIN = 1;
export const SPREAD_MAX = 5;
export const LEVEL_STEP = 1;

type QtyRange = readonly [min: number, max: number];

// [min, max) size per level, index 0 = touch
export const LEVEL_QTY: readonly [QtyRange, QtyRange, QtyRange] = [
  [0.5, 5.0],
  [1.0, 10.0],
  [2.0, 15.0],
];

type Level = { price: number; qty: number };

export class OrderbookGenerator extends FixtureGenerator<OrderbookSnapshot> {
  readonly columns = ORDERBOOK_COLUMNS;

  constructor(opts: SeriesOpts) {
    super("orderbook", opts);
  }

  *rows(): Generator<OrderbookSnapshot> {
    const walk = new MidPriceWalk(this.rng);

    for (let t = this.startMs; t < this.endMs; t += SNAPSHOT_INTERVAL_MS) {
      const mid = walk.step();
      const spread = this.rng.between(SPREAD_MIN, SPREAD_MAX);

      // draw order matters for seeded output: all bids, then all asks
      const [b1, b2, b3] = this.side("bid", mid, spread);
      const [a1, a2, a3] = this.side("ask", mid, spread);

      yield {
        timestamp_ms: t,
        symbol: this.symbol,
        bid_price_1: b1.price,
        bid_qty_1: b1.qty,
        bid_price_2: b2.price,
        bid_qty_2: b2.qty,
        bid_price_3: b3.price,
        bid_qty_3: b3.qty,
        ask_price_1: a1.price,
        ask_qty_1: a1.qty,
        ask_price_2: a2.price,
        ask_qty_2: a2.qty,
        ask_price_3: a3.price,
        ask_qty_3: a3.qty,
      };
    }
  }

  private side(side: Side, mid: number, spread: number): [Level, Level, Level] {
    const dir = side === "bid" ? -1 : 1;
    const touch = mid + (dir * spread) / 2;
    const level = (i: number, [lo, hi]: QtyRange): Level => ({
      price: roundPrice(touch + dir * LEVEL_STEP * i),
      qty: roundQty(this.rng.between(lo, hi)),
    });
    return [level(0, LEVEL_QTY[0]), level(1, LEVEL_QTY[1]), level(2, LEVEL_QTY[2])];
  }
}

export function orderbookSnapshots(opts: SeriesOpts): Generator<OrderbookSnapshot> {
  return new OrderbookGenerator(opts).rows();
}

export function generateOrderbook(opts: SeriesOpts, file: string): GenerationResult {
  return new OrderbookGenerator(opts).generate(file);
}
