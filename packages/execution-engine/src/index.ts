export { DummyVenueAdapter } from "./dummyVenueAdapter";
export type { DummyVenueAdapterOptions } from "./dummyVenueAdapter";
export type {
	OrderAck,
	OrderSide,
	OrderType,
	Quote,
	VenueAdapter,
} from "./venueAdapter";
