export type { Price } from "./types.js";
export { priceFromQuotes, bidOf, offerOf, zeroPrice } from "./price.js";
export { PricingService } from "./pricing-service.js";
export { PricingConnector } from "./pricing-connector.js";
