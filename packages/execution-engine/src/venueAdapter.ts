export type OrderSide = "buy" | "sell";
export type OrderType = "market" | "limit";

export interface Quote {
	symbol: string;
	bid: number;
	ask: number;
	last: number;
	/** ISO-8601 instant the quote was taken. */
	timestamp: string;
}

export interface OrderAck {
	orderId: string;
	symbol: string;
	side: OrderSide;
	type: OrderType;
	quantity: number;
	status: "accepted" | "rejected";
	reason?: string;
}

/**
 * Order-routing boundary for a live venue. Backtests never call it; it exists
 * so a broker integration can slot in without touching the signal engine.
 */
export interface VenueAdapter {
	fetchQuote(symbol: string): Promise<Quote>;
	placeOrder(
		symbol: string,
		quantity: number,
		side: OrderSide,
		orderType: OrderType
	): Promise<OrderAck>;
}
