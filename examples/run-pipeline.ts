/**
 * Run Pipeline: replays the sample treasury files through the full system.
 *
 * Reads data/input, writes data/output, and prints the replay summary.
 * Override any setting through TSYFLOW_* environment variables.
 *
 * Run: npx tsx examples/run-pipeline.ts
 */

import { resolveConfig, runTradingSystem } from "../src/index.js";

const config = resolveConfig();
const result = await runTradingSystem(config);

console.log("Replay summary:");
for (const [name, report] of Object.entries(result.reports)) {
	console.log(`  ${name.padEnd(12)} ${report.processed} processed, ${report.skipped.length} skipped`);
	for (const skipped of report.skipped) {
		console.log(`    line ${skipped.lineNumber}: ${skipped.reason}`);
	}
}

console.log("\nOutputs:");
for (const path of Object.values(result.outputs)) {
	console.log(`  ${path}`);
}

if (result.writeErrors.length > 0) {
	console.log(`\n${result.writeErrors.length} write(s) failed; see the log for details.`);
	process.exitCode = 1;
}
