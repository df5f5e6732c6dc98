/**
 * AlgoStreamingService: turns internal prices into two-way streams.
 *
 * Visible size alternates between 2,000,000 and 1,000,000 on successive
 * publications, across all products; hidden size is always twice visible.
 */

import type { Price } from "../pricing/types.js";
import { bidOf, offerOf } from "../pricing/price.js";
import type { ReferenceData } from "../reference/reference-data.js";
import type { Bond } from "../reference/types.js";
import { Decimal } from "../shared/decimal.js";
import type { ProductId } from "../shared/identifiers.js";
import { PricingSide } from "../shared/side.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Listener } from "../soa/types.js";
import type { AlgoStream, PriceStream } from "./types.js";

const LARGE_VISIBLE = 2_000_000;
const SMALL_VISIBLE = 1_000_000;
const HIDDEN_MULTIPLE = 2;

export class AlgoStreamingService extends KeyedService<ProductId, AlgoStream> {
	private readonly reference: ReferenceData;
	private publications = 0;

	constructor(reference: ReferenceData, options: ServiceOptions<AlgoStream> = {}) {
		super("algo-streaming", options);
		this.reference = reference;
	}

	/** Stores an externally built algo stream and notifies `update`. */
	override onMessage(stream: AlgoStream): void {
		this.storeAndNotify(stream.priceStream.product.productId, stream, "update");
	}

	/** Builds the next algo stream for `price` and notifies `update`. */
	publishPrice(price: Price): void {
		const visible = this.publications % 2 === 0 ? LARGE_VISIBLE : SMALL_VISIBLE;
		const hidden = visible * HIDDEN_MULTIPLE;
		const priceStream: PriceStream = {
			product: price.product,
			bidOrder: {
				price: bidOf(price),
				visibleQuantity: visible,
				hiddenQuantity: hidden,
				side: PricingSide.Bid,
			},
			offerOrder: {
				price: offerOf(price),
				visibleQuantity: visible,
				hiddenQuantity: hidden,
				side: PricingSide.Offer,
			},
		};
		this.publications++;
		this.onMessage({ priceStream });
	}

	protected override zeroValue(productId: ProductId): AlgoStream {
		return { priceStream: zeroStream(this.reference.bondOrPlaceholder(productId)) };
	}
}

export function zeroStream(product: Bond): PriceStream {
	const side = (s: PricingSide) => ({
		price: Decimal.zero(),
		visibleQuantity: 0,
		hiddenQuantity: 0,
		side: s,
	});
	return { product, bidOrder: side(PricingSide.Bid), offerOrder: side(PricingSide.Offer) };
}

/** Pricing listener: every added price becomes an algo stream. */
export function algoStreamingListener(service: AlgoStreamingService): Listener<Price> {
	return createListener({ onAdd: (price) => service.publishPrice(price) });
}
