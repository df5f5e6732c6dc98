export type { Bond, BucketedSector, BondRecord } from "./types.js";
export {
	ReferenceData,
	DEFAULT_REFERENCE_DATA_PATH,
	loadReferenceData,
	parseReferenceData,
	placeholderBond,
	UNKNOWN_BOND,
} from "./reference-data.js";
