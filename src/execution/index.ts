export {
	OrderType,
	Venue,
	VENUE_ROTATION,
	type ExecutionOrder,
	type AlgoExecution,
} from "./types.js";
export {
	AlgoExecutionService,
	MAX_AGGRESS_SPREAD,
	algoExecutionListener,
} from "./algo-execution-service.js";
export { ExecutionService, executionListener } from "./execution-service.js";
