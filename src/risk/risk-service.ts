/**
 * RiskService: PV01 exposure per product and per sector.
 *
 * The exposure quantity of a product mirrors its aggregate position. Every
 * change to a product recomputes the bucketed risk of its sector before
 * listeners are notified.
 */

import type { Position } from "../position/position.js";
import type { ReferenceData } from "../reference/reference-data.js";
import type { Bond, BucketedSector } from "../reference/types.js";
import { Decimal } from "../shared/decimal.js";
import type { ProductId } from "../shared/identifiers.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Listener } from "../soa/types.js";
import { aggregateBucketedRisk } from "./bucketed-risk.js";
import type { PV01 } from "./types.js";

export class RiskService extends KeyedService<ProductId, PV01<Bond>> {
	private readonly reference: ReferenceData;
	private readonly buckets = new Map<string, PV01<BucketedSector>>();

	/** Seeds a zero exposure for every reference product and sector. */
	constructor(reference: ReferenceData, options: ServiceOptions<PV01<Bond>> = {}) {
		super("risk", options);
		this.reference = reference;
		for (const id of reference.productIds()) {
			this.store.set(id, this.zeroValue(id));
		}
		for (const sector of reference.sectors()) {
			this.buckets.set(sector.name, { product: sector, pv01: Decimal.zero(), quantity: 0 });
		}
	}

	/**
	 * Sets the product's exposure quantity to the position's aggregate,
	 * recomputes its sector and notifies `add`.
	 */
	addPosition(position: Position): void {
		const id = position.product.productId;
		const exposure = this.store.get(id) ?? this.zeroValue(id);
		exposure.quantity = position.getAggregatePosition();
		this.refreshSectorOf(id);
		this.logger.info(
			{ productId: id, quantity: exposure.quantity, pv01: exposure.pv01.toString() },
			"Exposure updated",
		);
		this.storeAndNotify(id, exposure, "add");
	}

	/** Stores an exposure, recomputes its sector and notifies `add`. */
	override onMessage(exposure: PV01<Bond>): void {
		const id = exposure.product.productId;
		this.store.set(id, exposure);
		this.refreshSectorOf(id);
		this.storeAndNotify(id, exposure, "add");
	}

	/** Recomputes a sector from the stored exposures. Unknown sectors are ignored. */
	updateBucketedRisk(sectorName: string): void {
		const sector = this.reference.sector(sectorName);
		if (sector === undefined) {
			this.logger.warn({ sector: sectorName }, "Unknown sector; bucketed risk not updated");
			return;
		}
		this.buckets.set(sectorName, aggregateBucketedRisk(sector, (id) => this.getData(id)));
	}

	getBucketedRisk(sectorName: string): PV01<BucketedSector> | undefined {
		return this.buckets.get(sectorName);
	}

	/** Every sector's bucketed risk, in reference-data order. */
	bucketedRisks(): PV01<BucketedSector>[] {
		return [...this.buckets.values()];
	}

	protected override zeroValue(productId: ProductId): PV01<Bond> {
		return {
			product: this.reference.bondOrPlaceholder(productId),
			pv01: this.reference.pv01(productId) ?? Decimal.zero(),
			quantity: 0,
		};
	}

	private refreshSectorOf(productId: ProductId): void {
		const sector = this.reference.sectorOf(productId);
		if (sector !== undefined) this.updateBucketedRisk(sector.name);
	}
}

/** Position listener: every position update flows into risk. */
export function riskListener(service: RiskService): Listener<Position> {
	return createListener({ onUpdate: (position) => service.addPosition(position) });
}
