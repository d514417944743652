const EXCHANGE_PAIRS: Readonly<Record<string, string>> = {
  "WETH/USDC": "ETHUSD",
  "WBTC/USDC": "XBTUSD",
  "LINK/USDC": "LINKUSD",
  "UNI/USDC": "UNIUSD",
  "AAVE/USDC": "AAVEUSD",
  "CRV/USDC": "CRVUSD",
  "USDC/USDT": "USDCUSD",
  "DAI/USDC": "DAIUSD",
};

/**
 * Map an internal symbol to the exchange pair code, or null if unsupported
 */
export function toExchangePair(symbol: string): string | null {
  return EXCHANGE_PAIRS[symbol] ?? null;
}
