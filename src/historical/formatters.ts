/**
 * Line formats of the historical output files.
 *
 * Every line starts with an ISO timestamp. Prices are written in fractional
 * notation, PV01 values as plain decimals.
 */

import { TRADING_BOOKS } from "../booking/types.js";
import type { ExecutionOrder } from "../execution/types.js";
import type { Inquiry } from "../inquiry/types.js";
import type { Position } from "../position/position.js";
import type { Bond, BucketedSector } from "../reference/types.js";
import type { PV01 } from "../risk/types.js";
import { formatFractionalPrice } from "../shared/fractional-price.js";
import type { ProductId } from "../shared/identifiers.js";
import type { PriceStream, PriceStreamOrder } from "../streaming/types.js";

/** Turns one record into the lines appended for it. */
export type LineFormatter<V> = (data: V, timestamp: string) => string[];

const row = (...fields: (string | number)[]): string => fields.join(",");

export const formatPosition: LineFormatter<Position> = (position, ts) => {
	const books = TRADING_BOOKS.flatMap((book) => [book, position.getPosition(book)]);
	return [
		row(
			ts,
			position.product.productId,
			...books,
			"AGGREGATE",
			position.getAggregatePosition(),
		),
	];
};

/**
 * Risk lines: the product's exposure, then its sector's bucketed risk when
 * `sectorRisk` knows the product.
 */
export function riskFormatter(
	sectorRisk: (productId: ProductId) => PV01<BucketedSector> | undefined,
): LineFormatter<PV01<Bond>> {
	return (exposure, ts) => {
		const lines = [
			row(ts, exposure.product.productId, exposure.pv01.toString(), exposure.quantity),
		];
		const bucket = sectorRisk(exposure.product.productId);
		if (bucket !== undefined) {
			lines.push(row(ts, bucket.product.name, bucket.pv01.toString(), bucket.quantity));
		}
		return lines;
	};
}

export const formatExecution: LineFormatter<ExecutionOrder> = (order, ts) => [
	row(
		ts,
		order.product.productId,
		order.side.toUpperCase(),
		order.orderId,
		order.orderType,
		formatFractionalPrice(order.price),
		order.visibleQuantity,
		order.hiddenQuantity,
		order.isChildOrder ? "YES" : "NO",
	),
];

const streamLine = (ts: string, id: ProductId, order: PriceStreamOrder): string =>
	row(
		ts,
		id,
		order.side.toUpperCase(),
		formatFractionalPrice(order.price),
		order.visibleQuantity,
		order.hiddenQuantity,
	);

export const formatStream: LineFormatter<PriceStream> = (stream, ts) => [
	streamLine(ts, stream.product.productId, stream.bidOrder),
	streamLine(ts, stream.product.productId, stream.offerOrder),
];

export const formatInquiry: LineFormatter<Inquiry> = (inquiry, ts) => [
	row(
		ts,
		inquiry.inquiryId,
		inquiry.product.productId,
		inquiry.side.toUpperCase(),
		inquiry.quantity,
		formatFractionalPrice(inquiry.price),
		inquiry.state.toUpperCase(),
	),
];
