/**
 * MarketDataConnector: replays `productId,price,quantity,side` rows as order books.
 *
 * Consecutive rows for one product are collected into a book. The book is
 * sent to the service after `ordersPerBook` rows, when the product changes,
 * or at end of file.
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
import type { Bond } from "../reference/types.js";
import type { TradingError } from "../shared/errors.js";
import { fractionalPriceSchema } from "../shared/fractional-price.js";
import { type Result, ok } from "../shared/result.js";
import { PricingSide } from "../shared/side.js";
import type { Connector, SubscribeReport } from "../soa/types.js";
import type { MarketDataService } from "./market-data-service.js";
import { order } from "./order-book.js";
import type { Order, OrderBook } from "./types.js";

const DEFAULT_ORDERS_PER_BOOK = 10;

const marketDataRow = z.tuple([
	idField,
	fractionalPriceSchema,
	quantityField,
	z.enum(["BID", "OFFER"]),
]);

interface MarketDataRecord {
	readonly product: Bond;
	readonly order: Order;
}

export interface MarketDataConnectorOptions {
	readonly ordersPerBook?: number;
	readonly logger?: Logger;
}

export class MarketDataConnector implements Connector<OrderBook> {
	private readonly service: MarketDataService;
	private readonly reference: ReferenceData;
	private readonly ordersPerBook: number;
	private readonly logger: Logger;

	constructor(
		service: MarketDataService,
		reference: ReferenceData,
		options: MarketDataConnectorOptions = {},
	) {
		this.service = service;
		this.reference = reference;
		this.ordersPerBook = options.ordersPerBook ?? DEFAULT_ORDERS_PER_BOOK;
		this.logger = (options.logger ?? silentLogger).child({ connector: "market-data" });
	}

	async subscribe(path: string): Promise<SubscribeReport> {
		const lines = await readDataLines(path);
		let product: Bond | null = null;
		let bids: Order[] = [];
		let offers: Order[] = [];
		let count = 0;

		const emit = (): void => {
			if (product === null || count === 0) return;
			this.service.onMessage({ product, bidStack: bids, offerStack: offers });
			bids = [];
			offers = [];
			count = 0;
		};

		const report = replayLines(
			lines,
			(raw) => this.parse(raw),
			(record) => {
				if (product !== null && product.productId !== record.product.productId) {
					emit();
				}
				product = record.product;
				if (record.order.side === PricingSide.Bid) {
					bids.push(record.order);
				} else {
					offers.push(record.order);
				}
				count++;
				if (count >= this.ordersPerBook) emit();
			},
			this.logger,
		);
		emit();

		this.logger.info(
			{ path, processed: report.processed, skipped: report.skipped.length },
			"Market data replayed",
		);
		return report;
	}

	/** Subscribe-only. */
	publish(_book: OrderBook): void {}

	private parse(raw: string): Result<MarketDataRecord, TradingError> {
		const fields = parseFields(marketDataRow, raw);
		if (!fields.ok) return fields;
		const [id, price, quantity, side] = fields.value;
		const product = this.reference.resolve(id);
		if (!product.ok) return product;
		return ok({
			product: product.value,
			order: order(price, quantity, side === "BID" ? PricingSide.Bid : PricingSide.Offer),
		});
	}
}
