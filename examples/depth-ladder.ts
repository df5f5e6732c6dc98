/**
 * Depth Ladder: builds a book by hand, aggregates its depth and lets the
 * execution algo decide whether to cross.
 *
 * Run: npx tsx examples/depth-ladder.ts
 */

import {
	AlgoExecutionService,
	MarketDataService,
	PricingSide,
	formatFractionalPrice,
	loadReferenceData,
	order,
	productId,
	unwrap,
} from "../src/index.js";

const reference = unwrap(await loadReferenceData());
const us10y = productId("91282CJJ1");
const marketData = new MarketDataService(reference);
const algo = new AlgoExecutionService(reference);

marketData.onMessage({
	product: reference.bondOrPlaceholder(us10y),
	bidStack: [
		order("97.25", 2_000_000, PricingSide.Bid),
		order("97.24609375", 1_000_000, PricingSide.Bid),
		order("97.25", 3_000_000, PricingSide.Bid),
	],
	offerStack: [
		order("97.2578125", 1_000_000, PricingSide.Offer),
		order("97.26171875", 4_000_000, PricingSide.Offer),
		order("97.2578125", 500_000, PricingSide.Offer),
	],
});

const ladder = marketData.aggregateDepth(us10y);
console.log("Bids:");
for (const level of ladder.bidStack) {
	console.log(`  ${formatFractionalPrice(level.price)}  ${level.quantity}`);
}
console.log("Offers:");
for (const level of ladder.offerStack) {
	console.log(`  ${formatFractionalPrice(level.price)}  ${level.quantity}`);
}

const execution = algo.sendOrder(ladder);
if (execution === null) {
	console.log("\nSpread too wide; algo stays out.");
} else {
	const { order: sent } = execution;
	console.log(
		`\nAlgo ${sent.orderId}: ${sent.side} ${sent.visibleQuantity}+${sent.hiddenQuantity} @ ${formatFractionalPrice(sent.price)}`,
	);
}
