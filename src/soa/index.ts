export type {
	Listener,
	ListenerEvent,
	KeyedLookup,
	Publisher,
	Subscriber,
	Service,
	Connector,
	SubscribeReport,
	SkippedRecord,
} from "./types.js";
export { EMPTY_REPORT } from "./types.js";
export { KeyedStore } from "./keyed-store.js";
export { KeyedService, type ServiceOptions } from "./keyed-service.js";
export { createListener } from "./listener.js";
export {
	ListenerRegistry,
	type ListenerErrorPolicy,
	type ListenerErrorCallback,
	type ListenerRegistryOptions,
} from "./listener-registry.js";
