export type { LineSink } from "./line-sink.js";
export { MemoryLineSink } from "./memory-line-sink.js";
export { FileLineSink, type FileLineSinkConfig } from "./file-line-sink.js";
export {
	type SourceLine,
	type ReadLinesOptions,
	readDataLines,
	splitFields,
	parseFields,
	describeFailure,
	replayLines,
	quantityField,
	idField,
} from "./flat-file.js";
