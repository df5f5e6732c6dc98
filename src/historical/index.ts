export {
	HistoricalDataService,
	historicalDataListener,
	type HistoricalDataConfig,
} from "./historical-data-service.js";
export {
	formatExecution,
	formatInquiry,
	formatPosition,
	formatStream,
	riskFormatter,
	type LineFormatter,
} from "./formatters.js";
export { SinkConnector } from "./sink-connector.js";
