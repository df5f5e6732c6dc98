export type { Order, OrderBook, BestBidOffer } from "./types.js";
export {
	order,
	emptyBook,
	bestOrder,
	bestBidOffer,
	spread,
	aggregateDepth,
	stackQuantity,
} from "./order-book.js";
export { MarketDataService } from "./market-data-service.js";
export { MarketDataConnector, type MarketDataConnectorOptions } from "./market-data-connector.js";
