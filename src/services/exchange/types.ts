export type OrderSide = "buy" | "sell";

/**
 * Fill progress for one order. Volume and price stay undefined until the
 * exchange reports a non-zero value.
 */
export interface OrderFillStatus {
  orderId: string;
  /** False while the exchange does not list the order yet */
  found: boolean;
  status?: string;
  volumeExecuted?: number;
  averagePrice?: number;
}

/**
 * Private exchange operations used by live strike execution
 */
export interface ExchangeClient {
  placeOrder(
    pair: string,
    side: OrderSide,
    notionalUsd: number,
    referencePrice: number,
  ): Promise<string>;
  queryOrder(orderId: string): Promise<OrderFillStatus>;
  placeExit(pair: string, volume: number): Promise<string>;
  cancelOrder(orderId: string): Promise<void>;
}
