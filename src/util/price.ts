// prices are written with 2 decimals, quantities with 4
export const PRICE_DP = 2;
export const QTY_DP = 4;

export function roundTo(v: number, dp: number): number {
  const f = 10 ** dp;
  return Math.round(v * f) / f;
}

export const roundPrice = (v: number) => roundTo(v, PRICE_DP);
export const roundQty = (v: number) => roundTo(v, QTY_DP);
