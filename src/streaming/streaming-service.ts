import type { ReferenceData } from "../reference/reference-data.js";
import type { ProductId } from "../shared/identifiers.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Listener } from "../soa/types.js";
import { zeroStream } from "./algo-streaming-service.js";
import type { AlgoStream, PriceStream } from "./types.js";

export class StreamingService extends KeyedService<ProductId, PriceStream> {
	private readonly reference: ReferenceData;

	constructor(reference: ReferenceData, options: ServiceOptions<PriceStream> = {}) {
		super("streaming", options);
		this.reference = reference;
	}

	override onMessage(stream: PriceStream): void {
		this.publishPrice(stream);
	}

	/** Stores the stream and notifies `add`. */
	publishPrice(stream: PriceStream): void {
		this.storeAndNotify(stream.product.productId, stream, "add");
	}

	protected override zeroValue(productId: ProductId): PriceStream {
		return zeroStream(this.reference.bondOrPlaceholder(productId));
	}
}

/** Algo-streaming listener: publishes the price stream of every updated algo stream. */
export function streamingListener(service: StreamingService): Listener<AlgoStream> {
	return createListener({ onUpdate: (algo) => service.publishPrice(algo.priceStream) });
}
