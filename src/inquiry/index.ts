export { InquiryState, type Inquiry } from "./types.js";
export { InquiryService, inquiryQuoteListener, DEFAULT_QUOTE } from "./inquiry-service.js";
export { InquiryConnector } from "./inquiry-connector.js";
