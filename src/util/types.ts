export type Side = "bid" | "ask";

/** Top-3 snapshot. Keys are the CSV column names. */
export type OrderbookSnapshot = {
  timestamp_ms: number;
  symbol: string;
  bid_price_1: number;
  bid_qty_1: number;
  bid_price_2: number;
  bid_qty_2: number;
  bid_price_3: number;
  bid_qty_3: number;
  ask_price_1: number;
  ask_qty_1: number;
  ask_price_2: number;
  ask_qty_2: number;
  ask_price_3: number;
  ask_qty_3: number;
};

export type TradePrint = {
  timestamp_ms: number;
  symbol: string;
  trade_id: number;
  price: number;
  quantity: number;
  is_buyer_maker: boolean; // resting side was the buyer
};

export type CsvValue = string | number | boolean;

/** Resolves to C only when C names every key of R; otherwise never. */
export type CompleteColumns<R, C extends readonly (keyof R & string)[]> = [Exclude<keyof R, C[number]>] extends [never] ? C : never;

const orderbookColumns = [
  "timestamp_ms",
  "symbol",
  "bid_price_1",
  "bid_qty_1",
  "bid_price_2",
  "bid_qty_2",
  "bid_price_3",
  "bid_qty_3",
  "ask_price_1",
  "ask_qty_1",
  "ask_price_2",
  "ask_qty_2",
  "ask_price_3",
  "ask_qty_3",
] as const satisfies readonly (keyof OrderbookSnapshot)[];

const tradeColumns = ["timestamp_ms", "symbol", "trade_id", "price", "quantity", "is_buyer_maker"] as const satisfies readonly (keyof TradePrint)[];

export const ORDERBOOK_COLUMNS: CompleteColumns<OrderbookSnapshot, typeof orderbookColumns> = orderbookColumns;
export const TRADE_COLUMNS: CompleteColumns<TradePrint, typeof tradeColumns> = tradeColumns;
