export { Position } from "./position.js";
export { PositionService, positionListener } from "./position-service.js";
