/**
 * AlgoExecutionService: crosses the spread when the book is at its tightest.
 *
 * For each incoming book, the top of book is aggressed only when
 * offer − bid ≤ 1/128. Successive orders alternate between lifting the offer
 * and hitting the bid, starting with the offer. A quarter of the aggressed
 * quantity is shown, the rest is hidden.
 */

import { bestBidOffer, spread } from "../market-data/order-book.js";
import type { OrderBook } from "../market-data/types.js";
import type { ReferenceData } from "../reference/reference-data.js";
import { Decimal } from "../shared/decimal.js";
import { type ProductId, orderId } from "../shared/identifiers.js";
import { PricingSide } from "../shared/side.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Listener } from "../soa/types.js";
import { type AlgoExecution, type ExecutionOrder, OrderType } from "./types.js";

/** Widest spread at which the algo still aggresses. */
export const MAX_AGGRESS_SPREAD = Decimal.from(1).div(128);

const VISIBLE_FRACTION = 4;

export class AlgoExecutionService extends KeyedService<ProductId, AlgoExecution> {
	private readonly reference: ReferenceData;
	private ordersSent = 0;

	constructor(reference: ReferenceData, options: ServiceOptions<AlgoExecution> = {}) {
		super("algo-execution", options);
		this.reference = reference;
	}

	override onMessage(execution: AlgoExecution): void {
		this.storeAndNotify(execution.order.product.productId, execution, "update");
	}

	/**
	 * Aggresses the top of `book` when its spread is tight enough.
	 * @returns the algo execution sent, or null when the book was left alone
	 */
	sendOrder(book: OrderBook): AlgoExecution | null {
		const bbo = bestBidOffer(book);
		if (bbo === null) {
			this.logger.debug({ productId: book.product.productId }, "No two-sided market; not aggressing");
			return null;
		}
		const bookSpread = spread(bbo);
		if (bookSpread.gt(MAX_AGGRESS_SPREAD)) {
			this.logger.debug(
				{ productId: book.product.productId, spread: bookSpread.toString() },
				"Spread too wide; not aggressing",
			);
			return null;
		}

		const side = this.ordersSent % 2 === 0 ? PricingSide.Offer : PricingSide.Bid;
		const aggressed = side === PricingSide.Offer ? bbo.offerOrder : bbo.bidOrder;
		const visibleQuantity = Math.floor(aggressed.quantity / VISIBLE_FRACTION);
		this.ordersSent++;

		const order: ExecutionOrder = {
			product: book.product,
			side,
			orderId: orderId(`${book.product.ticker}-A${this.ordersSent}`),
			orderType: OrderType.Market,
			price: aggressed.price,
			visibleQuantity,
			hiddenQuantity: aggressed.quantity - visibleQuantity,
			parentOrderId: "",
			isChildOrder: false,
		};
		const execution: AlgoExecution = { order };
		this.logger.info(
			{ orderId: order.orderId, side, price: order.price.toString() },
			"Aggressing top of book",
		);
		this.onMessage(execution);
		return execution;
	}

	protected override zeroValue(productId: ProductId): AlgoExecution {
		return {
			order: {
				product: this.reference.bondOrPlaceholder(productId),
				side: PricingSide.Bid,
				orderId: orderId(`${productId}-A0`),
				orderType: OrderType.Market,
				price: Decimal.zero(),
				visibleQuantity: 0,
				hiddenQuantity: 0,
				parentOrderId: "",
				isChildOrder: false,
			},
		};
	}
}

/** Market-data listener: every added book is offered to the algo. */
export function algoExecutionListener(service: AlgoExecutionService): Listener<OrderBook> {
	return createListener({
		onAdd: (book) => {
			service.sendOrder(book);
		},
	});
}
