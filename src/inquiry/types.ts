import type { Bond } from "../reference/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { InquiryId } from "../shared/identifiers.js";
import type { TradeSide } from "../shared/side.js";

export const InquiryState = {
	Received: "received",
	Quoted: "quoted",
	Done: "done",
	Rejected: "rejected",
	CustomerRejected: "customer_rejected",
} as const;

export type InquiryState = (typeof InquiryState)[keyof typeof InquiryState];

/**
 * A customer request for a quote. The service quotes it by setting `price`,
 * and the connector moves `state` along; both mutate the stored object.
 */
export interface Inquiry {
	readonly inquiryId: InquiryId;
	readonly product: Bond;
	readonly side: TradeSide;
	readonly quantity: number;
	price: Decimal;
	state: InquiryState;
}
