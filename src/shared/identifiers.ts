/**
 * Domain identifiers: branded strings for compile-time safety.
 *
 * A ProductId (CUSIP) and an InquiryId are both strings on the wire, but a
 * service keyed on one must never be handed the other.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** CUSIP of a bond; the key of most services. */
export type ProductId = Brand<string, "ProductId">;
/** Identifier of a booked trade. */
export type TradeId = Brand<string, "TradeId">;
/** Identifier of an execution order. */
export type OrderId = Brand<string, "OrderId">;
/** Identifier of a customer inquiry. */
export type InquiryId = Brand<string, "InquiryId">;

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated ProductId. Throws if empty. */
export function productId(value: string): ProductId {
	return createBrandedId(value, "ProductId");
}

/** Create a validated TradeId. Throws if empty. */
export function tradeId(value: string): TradeId {
	return createBrandedId(value, "TradeId");
}

/** Create a validated OrderId. Throws if empty. */
export function orderId(value: string): OrderId {
	return createBrandedId(value, "OrderId");
}

/** Create a validated InquiryId. Throws if empty. */
export function inquiryId(value: string): InquiryId {
	return createBrandedId(value, "InquiryId");
}
