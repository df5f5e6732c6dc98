/**
 * PricingConnector: replays `productId,bid,offer` rows into the pricing service.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { idField, parseFields, readDataLines, replayLines } from "../persistence/flat-file.js";
import type { ReferenceData } from "../reference/reference-data.js";
import type { TradingError } from "../shared/errors.js";
import { fractionalPriceSchema } from "../shared/fractional-price.js";
import { type Result, ok } from "../shared/result.js";
import type { Connector, SubscribeReport } from "../soa/types.js";
import { priceFromQuotes } from "./price.js";
import type { PricingService } from "./pricing-service.js";
import type { Price } from "./types.js";

const priceRow = z.tuple([idField, fractionalPriceSchema, fractionalPriceSchema]);

export class PricingConnector implements Connector<Price> {
	private readonly service: PricingService;
	private readonly reference: ReferenceData;
	private readonly logger: Logger;

	constructor(service: PricingService, reference: ReferenceData, logger: Logger = silentLogger) {
		this.service = service;
		this.reference = reference;
		this.logger = logger.child({ connector: "pricing" });
	}

	async subscribe(path: string): Promise<SubscribeReport> {
		const lines = await readDataLines(path);
		const report = replayLines(
			lines,
			(raw) => this.parse(raw),
			(price) => this.service.onMessage(price),
			this.logger,
		);
		this.logger.info(
			{ path, processed: report.processed, skipped: report.skipped.length },
			"Prices replayed",
		);
		return report;
	}

	/** Subscribe-only. */
	publish(_price: Price): void {}

	private parse(raw: string): Result<Price, TradingError> {
		const fields = parseFields(priceRow, raw);
		if (!fields.ok) return fields;
		const [id, bid, offer] = fields.value;
		const product = this.reference.resolve(id);
		if (!product.ok) return product;
		return ok(priceFromQuotes(product.value, bid, offer));
	}
}
