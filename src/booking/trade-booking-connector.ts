/**
 * TradeBookingConnector: replays `productId,tradeId,price,book,quantity,side` rows.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import {
	idField,
	parseFields,
	quantityField,
	readDataLines,
	replayLines,
} from "../persistence/flat-file.js";
import type { ReferenceData } from "../reference/reference-data.js";
import type { TradingError } from "../shared/errors.js";
import { fractionalPriceSchema } from "../shared/fractional-price.js";
import { tradeId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import { TradeSide } from "../shared/side.js";
import type { Connector, SubscribeReport } from "../soa/types.js";
import type { TradeBookingService } from "./trade-booking-service.js";
import type { Trade } from "./types.js";

const tradeRow = z.tuple([
	idField,
	idField,
	fractionalPriceSchema,
	idField,
	quantityField,
	z.enum(["BUY", "SELL"]),
]);

export class TradeBookingConnector implements Connector<Trade> {
	private readonly service: TradeBookingService;
	private readonly reference: ReferenceData;
	private readonly logger: Logger;

	constructor(
		service: TradeBookingService,
		reference: ReferenceData,
		logger: Logger = silentLogger,
	) {
		this.service = service;
		this.reference = reference;
		this.logger = logger.child({ connector: "trade-booking" });
	}

	async subscribe(path: string): Promise<SubscribeReport> {
		const lines = await readDataLines(path);
		const report = replayLines(
			lines,
			(raw) => this.parse(raw),
			(trade) => this.service.onMessage(trade),
			this.logger,
		);
		this.logger.info(
			{ path, processed: report.processed, skipped: report.skipped.length },
			"Trades replayed",
		);
		return report;
	}

	/** Subscribe-only. */
	publish(_trade: Trade): void {}

	private parse(raw: string): Result<Trade, TradingError> {
		const fields = parseFields(tradeRow, raw);
		if (!fields.ok) return fields;
		const [id, trade, price, book, quantity, side] = fields.value;
		const product = this.reference.resolve(id);
		if (!product.ok) return product;
		return ok({
			product: product.value,
			tradeId: tradeId(trade),
			price,
			book,
			quantity,
			side: side === "BUY" ? TradeSide.Buy : TradeSide.Sell,
		});
	}
}
