export { GuiService, guiListener, type GuiThrottleOptions } from "./gui-service.js";
export { GuiConnector } from "./gui-connector.js";
