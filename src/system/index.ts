export {
	createTradingSystem,
	INPUT_FILES,
	OUTPUT_FILES,
	type InputName,
	type SystemSettings,
	type TradingConnectors,
	type TradingServices,
	type TradingSinks,
	type TradingSystem,
	type TradingSystemDeps,
} from "./trading-system.js";
export { runTradingSystem, type RunOptions, type RunResult } from "./run.js";
