/**
 * InquiryConnector: replays `inquiryId,productId,side,quantity,price,state` rows,
 * and completes the quote round-trip when the service publishes.
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
import { inquiryId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import { TradeSide } from "../shared/side.js";
import type { Connector, SubscribeReport } from "../soa/types.js";
import type { InquiryService } from "./inquiry-service.js";
import { type Inquiry, InquiryState } from "./types.js";

const STATES = {
	RECEIVED: InquiryState.Received,
	QUOTED: InquiryState.Quoted,
	DONE: InquiryState.Done,
	REJECTED: InquiryState.Rejected,
	CUSTOMER_REJECTED: InquiryState.CustomerRejected,
} as const satisfies Record<string, InquiryState>;

const inquiryRow = z.tuple([
	idField,
	idField,
	z.enum(["BUY", "SELL"]),
	quantityField,
	fractionalPriceSchema,
	z.enum(["RECEIVED", "QUOTED", "DONE", "REJECTED", "CUSTOMER_REJECTED"]).transform((s) => STATES[s]),
]);

export class InquiryConnector implements Connector<Inquiry> {
	private readonly service: InquiryService;
	private readonly reference: ReferenceData;
	private readonly logger: Logger;

	constructor(service: InquiryService, reference: ReferenceData, logger: Logger = silentLogger) {
		this.service = service;
		this.reference = reference;
		this.logger = logger.child({ connector: "inquiry" });
	}

	async subscribe(path: string): Promise<SubscribeReport> {
		const lines = await readDataLines(path);
		const report = replayLines(
			lines,
			(raw) => this.parse(raw),
			(inquiry) => this.service.onMessage(inquiry),
			this.logger,
		);
		this.logger.info(
			{ path, processed: report.processed, skipped: report.skipped.length },
			"Inquiries replayed",
		);
		return report;
	}

	/**
	 * A `received` inquiry is moved to `quoted` and fed back to the service,
	 * then moved to `done` and fed back again. Other states are only logged.
	 */
	publish(inquiry: Inquiry): void {
		if (inquiry.state !== InquiryState.Received) {
			this.logger.info({ inquiryId: inquiry.inquiryId, state: inquiry.state }, "Inquiry not quoted");
			return;
		}
		inquiry.state = InquiryState.Quoted;
		this.service.onMessage(inquiry);
		inquiry.state = InquiryState.Done;
		this.service.onMessage(inquiry);
	}

	private parse(raw: string): Result<Inquiry, TradingError> {
		const fields = parseFields(inquiryRow, raw);
		if (!fields.ok) return fields;
		const [id, product, side, quantity, price, state] = fields.value;
		const bond = this.reference.resolve(product);
		if (!bond.ok) return bond;
		return ok({
			inquiryId: inquiryId(id),
			product: bond.value,
			side: side === "BUY" ? TradeSide.Buy : TradeSide.Sell,
			quantity,
			price,
			state,
		});
	}
}
