/**
 * Latest internal price per product.
 */

import type { ReferenceData } from "../reference/reference-data.js";
import type { ProductId } from "../shared/identifiers.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { zeroPrice } from "./price.js";
import type { Price } from "./types.js";

export class PricingService extends KeyedService<ProductId, Price> {
	private readonly reference: ReferenceData;

	constructor(reference: ReferenceData, options: ServiceOptions<Price> = {}) {
		super("pricing", options);
		this.reference = reference;
	}

	override onMessage(price: Price): void {
		this.storeAndNotify(price.product.productId, price, "add");
	}

	protected override zeroValue(productId: ProductId): Price {
		return zeroPrice(this.reference.bondOrPlaceholder(productId));
	}
}
