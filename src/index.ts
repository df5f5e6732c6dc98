// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type ProductId,
	type TradeId,
	type OrderId,
	type InquiryId,
	productId,
	tradeId,
	orderId,
	inquiryId,
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	ErrorCategory,
	TradingError,
	ConfigError,
	ReferenceDataError,
	SinkWriteError,
	SystemError,
	classifyError,
	Decimal,
	cycle,
	PricingSide,
	TradeSide,
	tradeSideForAggressed,
	fractionalPriceSchema,
	parseFractionalPrice,
	formatFractionalPrice,
	type Clock,
	SystemClock,
	FakeClock,
	formatTimestamp,
	type TsyflowConfig,
	DEFAULT_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Logging & Validation ─────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";

// ── Service Layer ────────────────────────────────────────────────────
export {
	type Listener,
	type ListenerEvent,
	type KeyedLookup,
	type Publisher,
	type Subscriber,
	type Service,
	type Connector,
	type SubscribeReport,
	type SkippedRecord,
	EMPTY_REPORT,
	KeyedStore,
	KeyedService,
	type ServiceOptions,
	createListener,
	ListenerRegistry,
	type ListenerErrorPolicy,
	type ListenerErrorCallback,
	type ListenerRegistryOptions,
} from "./soa/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type LineSink,
	MemoryLineSink,
	FileLineSink,
	type FileLineSinkConfig,
	type SourceLine,
	type ReadLinesOptions,
	readDataLines,
	splitFields,
	parseFields,
	describeFailure,
	replayLines,
	quantityField,
	idField,
} from "./persistence/index.js";

// ── Reference Data ───────────────────────────────────────────────────
export {
	type Bond,
	type BucketedSector,
	type BondRecord,
	ReferenceData,
	DEFAULT_REFERENCE_DATA_PATH,
	loadReferenceData,
	parseReferenceData,
	placeholderBond,
	UNKNOWN_BOND,
} from "./reference/index.js";

// ── Market Data ──────────────────────────────────────────────────────
export {
	type Order,
	type OrderBook,
	type BestBidOffer,
	order,
	emptyBook,
	bestOrder,
	bestBidOffer,
	spread,
	aggregateDepth,
	stackQuantity,
	MarketDataService,
	MarketDataConnector,
	type MarketDataConnectorOptions,
} from "./market-data/index.js";

// ── Pricing & Streaming ──────────────────────────────────────────────
export {
	type Price,
	priceFromQuotes,
	bidOf,
	offerOf,
	zeroPrice,
	PricingService,
	PricingConnector,
} from "./pricing/index.js";
export {
	type PriceStreamOrder,
	type PriceStream,
	type AlgoStream,
	AlgoStreamingService,
	algoStreamingListener,
	zeroStream,
	StreamingService,
	streamingListener,
} from "./streaming/index.js";

// ── Execution & Booking ──────────────────────────────────────────────
export {
	OrderType,
	Venue,
	VENUE_ROTATION,
	type ExecutionOrder,
	type AlgoExecution,
	AlgoExecutionService,
	MAX_AGGRESS_SPREAD,
	algoExecutionListener,
	ExecutionService,
	executionListener,
} from "./execution/index.js";
export {
	TRADING_BOOKS,
	type Trade,
	TradeBookingService,
	tradeBookingListener,
	TradeBookingConnector,
} from "./booking/index.js";

// ── Positions & Risk ─────────────────────────────────────────────────
export { Position, PositionService, positionListener } from "./position/index.js";
export {
	type PV01,
	aggregateBucketedRisk,
	RiskService,
	riskListener,
} from "./risk/index.js";

// ── Inquiries ────────────────────────────────────────────────────────
export {
	InquiryState,
	type Inquiry,
	InquiryService,
	inquiryQuoteListener,
	DEFAULT_QUOTE,
	InquiryConnector,
} from "./inquiry/index.js";

// ── GUI & Historical ─────────────────────────────────────────────────
export { GuiService, guiListener, type GuiThrottleOptions, GuiConnector } from "./gui/index.js";
export {
	HistoricalDataService,
	historicalDataListener,
	type HistoricalDataConfig,
	formatExecution,
	formatInquiry,
	formatPosition,
	formatStream,
	riskFormatter,
	type LineFormatter,
	SinkConnector,
} from "./historical/index.js";

// ── System ───────────────────────────────────────────────────────────
export {
	createTradingSystem,
	INPUT_FILES,
	OUTPUT_FILES,
	type InputName,
	type SystemSettings,
	type TradingConnectors,
	type TradingServices,
	type TradingSinks,
	type TradingSystem,
	type TradingSystemDeps,
	runTradingSystem,
	type RunOptions,
	type RunResult,
} from "./system/index.js";
