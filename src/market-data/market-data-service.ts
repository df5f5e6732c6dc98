/**
 * Latest order book per product.
 */

import type { ReferenceData } from "../reference/reference-data.js";
import type { ProductId } from "../shared/identifiers.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { aggregateDepth, bestBidOffer, emptyBook } from "./order-book.js";
import type { BestBidOffer, OrderBook } from "./types.js";

export class MarketDataService extends KeyedService<ProductId, OrderBook> {
	private readonly reference: ReferenceData;

	constructor(reference: ReferenceData, options: ServiceOptions<OrderBook> = {}) {
		super("market-data", options);
		this.reference = reference;
	}

	/** Stores the book under its product and notifies `add`. */
	override onMessage(book: OrderBook): void {
		this.storeAndNotify(book.product.productId, book, "add");
	}

	/** Top of the stored book, or null when a side is empty or nothing is stored. */
	getBestBidOffer(productId: ProductId): BestBidOffer | null {
		return bestBidOffer(this.getData(productId));
	}

	/**
	 * Replaces the stored book with its depth aggregation and returns it.
	 * Listeners are not notified. A product with no stored book is left absent.
	 */
	aggregateDepth(productId: ProductId): OrderBook {
		const aggregated = aggregateDepth(this.getData(productId));
		if (this.store.has(productId)) {
			this.store.set(productId, aggregated);
		}
		return aggregated;
	}

	protected override zeroValue(productId: ProductId): OrderBook {
		return emptyBook(this.reference.bondOrPlaceholder(productId));
	}
}
