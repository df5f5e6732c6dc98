export type { PV01 } from "./types.js";
export { aggregateBucketedRisk } from "./bucketed-risk.js";
export { RiskService, riskListener } from "./risk-service.js";
