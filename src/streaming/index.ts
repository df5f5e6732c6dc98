export type { PriceStreamOrder, PriceStream, AlgoStream } from "./types.js";
export {
	AlgoStreamingService,
	algoStreamingListener,
	zeroStream,
} from "./algo-streaming-service.js";
export { StreamingService, streamingListener } from "./streaming-service.js";
