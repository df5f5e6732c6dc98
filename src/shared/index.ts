export {
	type ProductId,
	type TradeId,
	type OrderId,
	type InquiryId,
	productId,
	tradeId,
	orderId,
	inquiryId,
} from "./identifiers.js";

export { type Result, ok, err, map, flatMap, unwrap } from "./result.js";

export {
	ErrorCategory,
	TradingError,
	ConfigError,
	ReferenceDataError,
	SinkWriteError,
	SystemError,
	classifyError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { cycle } from "./cycle.js";
export { PricingSide, TradeSide, tradeSideForAggressed } from "./side.js";
export {
	fractionalPriceSchema,
	parseFractionalPrice,
	formatFractionalPrice,
} from "./fractional-price.js";
export { type Clock, SystemClock, FakeClock, formatTimestamp } from "./time.js";
export { type TsyflowConfig, DEFAULT_CONFIG, configFromEnv, resolveConfig } from "./config.js";
