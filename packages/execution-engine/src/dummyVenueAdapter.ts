import { createLogger } from "@gold-rotation/core";
import type { ModuleLogger } from "@gold-rotation/core";
import type {
	OrderAck,
	OrderSide,
	OrderType,
	Quote,
	VenueAdapter,
} from "./venueAdapter";

export interface DummyVenueAdapterOptions {
	/** Last prices served by fetchQuote; unknown symbols quote at 0. */
	prices?: Record<string, number>;
	now?: () => Date;
	logger?: ModuleLogger;
}

/** Paper venue: quotes from a fixed price map and acknowledges every valid order. */
export class DummyVenueAdapter implements VenueAdapter {
	private readonly prices: Map<string, number>;
	private readonly now: () => Date;
	private readonly logger: ModuleLogger;
	private readonly orders: OrderAck[] = [];

	constructor(options: DummyVenueAdapterOptions = {}) {
		this.prices = new Map(Object.entries(options.prices ?? {}));
		this.now = options.now ?? (() => new Date());
		this.logger = options.logger ?? createLogger("execution-engine:paper");
	}

	async fetchQuote(symbol: string): Promise<Quote> {
		const last = this.prices.get(symbol) ?? 0;
		return {
			symbol,
			bid: last,
			ask: last,
			last,
			timestamp: this.now().toISOString(),
		};
	}

	async placeOrder(
		symbol: string,
		quantity: number,
		side: OrderSide,
		orderType: OrderType
	): Promise<OrderAck> {
		const valid = Number.isFinite(quantity) && quantity > 0;
		const ack: OrderAck = {
			orderId: `paper-${this.orders.length + 1}`,
			symbol,
			side,
			type: orderType,
			quantity,
			status: valid ? "accepted" : "rejected",
			...(valid ? {} : { reason: "quantity_not_positive" }),
		};
		this.orders.push(ack);
		this.logger.info("paper_order", { ...ack });
		return ack;
	}

	history(): readonly OrderAck[] {
		return [...this.orders];
	}
}
