/**
 * Trading system wiring: builds every service, connects listeners in
 * pipeline order and exposes the subscribe-side connectors.
 */

import { join } from "node:path";
import { TradeBookingConnector } from "../booking/trade-booking-connector.js";
import { TradeBookingService, tradeBookingListener } from "../booking/trade-booking-service.js";
import type { Trade } from "../booking/types.js";
import { AlgoExecutionService, algoExecutionListener } from "../execution/algo-execution-service.js";
import { ExecutionService, executionListener } from "../execution/execution-service.js";
import type { ExecutionOrder } from "../execution/types.js";
import { GuiConnector } from "../gui/gui-connector.js";
import { GuiService, guiListener } from "../gui/gui-service.js";
import {
	formatExecution,
	formatInquiry,
	formatPosition,
	formatStream,
	riskFormatter,
} from "../historical/formatters.js";
import {
	HistoricalDataService,
	historicalDataListener,
} from "../historical/historical-data-service.js";
import { SinkConnector } from "../historical/sink-connector.js";
import { InquiryConnector } from "../inquiry/inquiry-connector.js";
import { InquiryService, inquiryQuoteListener } from "../inquiry/inquiry-service.js";
import type { Inquiry } from "../inquiry/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { MarketDataConnector } from "../market-data/market-data-connector.js";
import { MarketDataService } from "../market-data/market-data-service.js";
import type { LineSink } from "../persistence/line-sink.js";
import type { Position } from "../position/position.js";
import { PositionService, positionListener } from "../position/position-service.js";
import { PricingConnector } from "../pricing/pricing-connector.js";
import { PricingService } from "../pricing/pricing-service.js";
import type { ReferenceData } from "../reference/reference-data.js";
import type { Bond } from "../reference/types.js";
import { RiskService, riskListener } from "../risk/risk-service.js";
import type { PV01 } from "../risk/types.js";
import { DEFAULT_CONFIG, type TsyflowConfig } from "../shared/config.js";
import { inquiryId, productId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { ServiceOptions } from "../soa/keyed-service.js";
import type { SubscribeReport } from "../soa/types.js";
import { AlgoStreamingService, algoStreamingListener } from "../streaming/algo-streaming-service.js";
import { StreamingService, streamingListener } from "../streaming/streaming-service.js";
import type { PriceStream } from "../streaming/types.js";

/** Output destinations, one per output file. */
export interface TradingSinks {
	readonly gui: LineSink;
	readonly positions: LineSink;
	readonly risk: LineSink;
	readonly executions: LineSink;
	readonly streaming: LineSink;
	readonly inquiries: LineSink;
}

/** File name of each sink under the output directory. */
export const OUTPUT_FILES = {
	gui: "gui.txt",
	positions: "positions.txt",
	risk: "risk.txt",
	executions: "executions.txt",
	streaming: "streaming.txt",
	inquiries: "allinquiries.txt",
} as const satisfies Record<keyof TradingSinks, string>;

/** Input files, in the order they are replayed. */
export const INPUT_FILES = {
	prices: "prices.txt",
	trades: "trades.txt",
	marketData: "marketdata.txt",
	inquiries: "inquiries.txt",
} as const;

export type InputName = keyof typeof INPUT_FILES;

export type SystemSettings = Pick<
	TsyflowConfig,
	"guiThrottleMs" | "guiMaxUpdates" | "ordersPerBook" | "isolateListenerErrors"
>;

export interface TradingSystemDeps {
	readonly reference: ReferenceData;
	readonly sinks: TradingSinks;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly config?: Partial<SystemSettings>;
}

export interface TradingServices {
	readonly pricing: PricingService;
	readonly algoStreaming: AlgoStreamingService;
	readonly streaming: StreamingService;
	readonly marketData: MarketDataService;
	readonly algoExecution: AlgoExecutionService;
	readonly execution: ExecutionService;
	readonly tradeBooking: TradeBookingService;
	readonly position: PositionService;
	readonly risk: RiskService;
	readonly inquiry: InquiryService;
	readonly gui: GuiService;
	readonly historicalPositions: HistoricalDataService<Position>;
	readonly historicalRisk: HistoricalDataService<PV01<Bond>>;
	readonly historicalExecutions: HistoricalDataService<ExecutionOrder>;
	readonly historicalStreaming: HistoricalDataService<PriceStream>;
	readonly historicalInquiries: HistoricalDataService<Inquiry>;
}

export interface TradingConnectors {
	readonly pricing: PricingConnector;
	readonly tradeBooking: TradeBookingConnector;
	readonly marketData: MarketDataConnector;
	readonly inquiry: InquiryConnector;
}

export interface TradingSystem {
	readonly services: TradingServices;
	readonly connectors: TradingConnectors;
	/** Replays the four input files from `inputDir`, in pipeline order. */
	subscribeAll(inputDir: string): Promise<Record<InputName, SubscribeReport>>;
}

export function createTradingSystem(deps: TradingSystemDeps): TradingSystem {
	const { reference, sinks } = deps;
	const clock = deps.clock ?? SystemClock;
	const logger = deps.logger ?? silentLogger;
	const settings: SystemSettings = { ...DEFAULT_CONFIG, ...deps.config };
	const options = {
		logger,
		errorPolicy: settings.isolateListenerErrors ? "isolate" : "propagate",
	} satisfies ServiceOptions<unknown>;

	// ── Services ────────────────────────────────────────────────────
	const pricing = new PricingService(reference, options);
	const algoStreaming = new AlgoStreamingService(reference, options);
	const streaming = new StreamingService(reference, options);
	const marketData = new MarketDataService(reference, options);
	const algoExecution = new AlgoExecutionService(reference, options);
	const execution = new ExecutionService(reference, options);
	const tradeBooking = new TradeBookingService(options);
	const position = new PositionService(reference, options);
	const risk = new RiskService(reference, options);
	const inquiry = new InquiryService(options);
	const gui = new GuiService(reference, options);

	gui.setConnector(new GuiConnector(sinks.gui, clock));

	const historicalPositions = new HistoricalDataService<Position>(
		{
			name: "historical-positions",
			connector: new SinkConnector(sinks.positions, formatPosition, clock),
			keyOf: (p) => p.product.productId,
			zeroValue: (key) => position.getData(productId(key)),
		},
		options,
	);
	const historicalRisk = new HistoricalDataService<PV01<Bond>>(
		{
			name: "historical-risk",
			connector: new SinkConnector(
				sinks.risk,
				riskFormatter((id) => {
					const sector = reference.sectorOf(id);
					return sector === undefined ? undefined : risk.getBucketedRisk(sector.name);
				}),
				clock,
			),
			keyOf: (r) => r.product.productId,
			zeroValue: (key) => risk.getData(productId(key)),
		},
		options,
	);
	const historicalExecutions = new HistoricalDataService<ExecutionOrder>(
		{
			name: "historical-executions",
			connector: new SinkConnector(sinks.executions, formatExecution, clock),
			keyOf: (o) => o.product.productId,
			zeroValue: (key) => execution.getData(productId(key)),
		},
		options,
	);
	const historicalStreaming = new HistoricalDataService<PriceStream>(
		{
			name: "historical-streaming",
			connector: new SinkConnector(sinks.streaming, formatStream, clock),
			keyOf: (s) => s.product.productId,
			zeroValue: (key) => streaming.getData(productId(key)),
		},
		options,
	);
	const historicalInquiries = new HistoricalDataService<Inquiry>(
		{
			name: "historical-inquiries",
			connector: new SinkConnector(sinks.inquiries, formatInquiry, clock),
			keyOf: (i) => i.inquiryId,
			zeroValue: (key) => inquiry.getData(inquiryId(key)),
		},
		options,
	);

	// ── Connectors ──────────────────────────────────────────────────
	const connectors: TradingConnectors = {
		pricing: new PricingConnector(pricing, reference, logger),
		tradeBooking: new TradeBookingConnector(tradeBooking, reference, logger),
		marketData: new MarketDataConnector(marketData, reference, {
			ordersPerBook: settings.ordersPerBook,
			logger,
		}),
		inquiry: new InquiryConnector(inquiry, reference, logger),
	};
	inquiry.setConnector(connectors.inquiry);

	// ── Listeners, in pipeline order ────────────────────────────────
	pricing.addListener(
		guiListener(gui, {
			throttleMs: settings.guiThrottleMs,
			maxUpdates: settings.guiMaxUpdates,
			clock,
		}),
	);
	pricing.addListener(algoStreamingListener(algoStreaming));
	algoStreaming.addListener(streamingListener(streaming));
	streaming.addListener(historicalDataListener(historicalStreaming));
	position.addListener(riskListener(risk));
	tradeBooking.addListener(positionListener(position));
	execution.addListener(tradeBookingListener(tradeBooking));
	algoExecution.addListener(executionListener(execution));
	marketData.addListener(algoExecutionListener(algoExecution));
	execution.addListener(historicalDataListener(historicalExecutions));
	risk.addListener(historicalDataListener(historicalRisk));
	position.addListener(historicalDataListener(historicalPositions));
	inquiry.addListener(historicalDataListener(historicalInquiries));
	inquiry.addListener(inquiryQuoteListener(inquiry));

	const services: TradingServices = {
		pricing,
		algoStreaming,
		streaming,
		marketData,
		algoExecution,
		execution,
		tradeBooking,
		position,
		risk,
		inquiry,
		gui,
		historicalPositions,
		historicalRisk,
		historicalExecutions,
		historicalStreaming,
		historicalInquiries,
	};

	return {
		services,
		connectors,
		async subscribeAll(inputDir) {
			const prices = await connectors.pricing.subscribe(join(inputDir, INPUT_FILES.prices));
			const trades = await connectors.tradeBooking.subscribe(join(inputDir, INPUT_FILES.trades));
			const marketDataReport = await connectors.marketData.subscribe(
				join(inputDir, INPUT_FILES.marketData),
			);
			const inquiries = await connectors.inquiry.subscribe(join(inputDir, INPUT_FILES.inquiries));
			return { prices, trades, marketData: marketDataReport, inquiries };
		},
	};
}
