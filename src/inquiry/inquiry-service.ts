/**
 * InquiryService: customer inquiries keyed by inquiry id.
 *
 * Quotes and rejections mutate the stored inquiry and go out through the
 * inquiry connector, which may feed the same object straight back in.
 */

import { UNKNOWN_BOND } from "../reference/reference-data.js";
import { Decimal } from "../shared/decimal.js";
import { SystemError } from "../shared/errors.js";
import type { InquiryId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/side.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Connector, Listener } from "../soa/types.js";
import { type Inquiry, InquiryState } from "./types.js";

/** Price quoted by the default quoting listener. */
export const DEFAULT_QUOTE = Decimal.from(100);

export class InquiryService extends KeyedService<InquiryId, Inquiry> {
	private connector: Connector<Inquiry> | null = null;

	constructor(options: ServiceOptions<Inquiry> = {}) {
		super("inquiry", options);
	}

	/** Connector that quoted and rejected inquiries are published through. */
	setConnector(connector: Connector<Inquiry>): void {
		this.connector = connector;
	}

	/** Stores the inquiry and notifies `add` then `update`. */
	override onMessage(inquiry: Inquiry): void {
		this.storeAndNotify(inquiry.inquiryId, inquiry, "add", "update");
	}

	/**
	 * Sets the price of a stored inquiry and publishes it.
	 * @returns false when no inquiry is stored under `inquiryId`
	 * @throws SystemError if no connector has been set
	 */
	sendQuote(inquiryId: InquiryId, price: Decimal): boolean {
		const inquiry = this.store.get(inquiryId);
		if (inquiry === undefined) {
			this.logger.warn({ inquiryId }, "Cannot quote unknown inquiry");
			return false;
		}
		const connector = this.requireConnector();
		inquiry.price = price;
		this.logger.info({ inquiryId, price: price.toString() }, "Quoting inquiry");
		connector.publish(inquiry);
		return true;
	}

	/**
	 * Marks a stored inquiry rejected and publishes it.
	 * @returns false when no inquiry is stored under `inquiryId`
	 * @throws SystemError if no connector has been set
	 */
	rejectInquiry(inquiryId: InquiryId): boolean {
		const inquiry = this.store.get(inquiryId);
		if (inquiry === undefined) {
			this.logger.warn({ inquiryId }, "Cannot reject unknown inquiry");
			return false;
		}
		const connector = this.requireConnector();
		inquiry.state = InquiryState.Rejected;
		this.logger.info({ inquiryId }, "Rejecting inquiry");
		connector.publish(inquiry);
		return true;
	}

	protected override zeroValue(inquiryId: InquiryId): Inquiry {
		return {
			inquiryId,
			product: UNKNOWN_BOND,
			side: TradeSide.Buy,
			quantity: 0,
			price: Decimal.zero(),
			state: InquiryState.Received,
		};
	}

	private requireConnector(): Connector<Inquiry> {
		if (this.connector === null) {
			throw new SystemError("Inquiry connector not set", { service: "inquiry" });
		}
		return this.connector;
	}
}

/** Inquiry listener: quotes every inquiry that arrives in `received`. */
export function inquiryQuoteListener(
	service: InquiryService,
	quote: Decimal = DEFAULT_QUOTE,
): Listener<Inquiry> {
	return createListener({
		onUpdate: (inquiry) => {
			if (inquiry.state === InquiryState.Received) {
				service.sendQuote(inquiry.inquiryId, quote);
			}
		},
	});
}
