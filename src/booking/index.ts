export { TRADING_BOOKS, type Trade } from "./types.js";
export { TradeBookingService, tradeBookingListener } from "./trade-booking-service.js";
export { TradeBookingConnector } from "./trade-booking-connector.js";
