export { CONSTRAINTS_TTL_MS, VenueGateway, parseOrderSide, parseOrderType } from "./gateway.js";
export type { CallOptions, VenueGatewayConfig } from "./gateway.js";
export { parseVenueNumber, parseVenueNumberOr } from "./numeric.js";
export { DEFAULT_PAPER_CONSTRAINTS, PaperVenue } from "./paper-venue.js";
export type { PaperVenueConfig, PaperVenueMethod } from "./paper-venue.js";
export { OrderSide, OrderType, VenueCategory } from "./types.js";
export type {
	Kline,
	OpenOrder,
	OrderRequest,
	PlacedOrder,
	RawKline,
	RawOpenOrder,
	RawPlaceOrderRequest,
	RawPlacedOrder,
	RawPosition,
	RawTradingConstraints,
	TradingConstraints,
	VenueAdapter,
	VenuePosition,
} from "./types.js";
