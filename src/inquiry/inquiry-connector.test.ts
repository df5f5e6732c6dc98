import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { US3Y, treasuries } from "../__tests__/helpers.js";
import { inquiryId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/side.js";
import { InquiryConnector } from "./inquiry-connector.js";
import { InquiryService, inquiryQuoteListener } from "./inquiry-service.js";
import { InquiryState } from "./types.js";

async function inputFile(rows: string[]): Promise<string> {
	const dir = await mkdtemp(join(tmpdir(), "tsyflow-inq-"));
	const path = join(dir, "inquiries.txt");
	await writeFile(
		path,
		["inquiryId,productId,side,quantity,price,state", ...rows].join("\n"),
		"utf-8",
	);
	return path;
}

describe("InquiryConnector", () => {
	it("replays inquiries and completes the quote round-trip", async () => {
		const service = new InquiryService();
		const connector = new InquiryConnector(service, treasuries);
		service.setConnector(connector);
		service.addListener(inquiryQuoteListener(service));

		const report = await connector.subscribe(
			await inputFile([
				"INQ0001,91282CJK8,SELL,2000000,100-000,RECEIVED",
				"INQ0002,91282CJK8,BUY,1000000,99-31+,CUSTOMER_REJECTED",
			]),
		);

		expect(report).toEqual({ processed: 2, skipped: [] });
		const first = service.getData(inquiryId("INQ0001"));
		expect(first.product.productId).toBe(US3Y);
		expect(first.side).toBe(TradeSide.Sell);
		expect(first.quantity).toBe(2_000_000);
		expect(first.state).toBe(InquiryState.Done);
		expect(first.price.toString()).toBe("100");
		const second = service.getData(inquiryId("INQ0002"));
		expect(second.state).toBe(InquiryState.CustomerRejected);
		expect(second.price.toString()).toBe("99.984375");
	});

	it("skips an unknown state", async () => {
		const service = new InquiryService();
		const connector = new InquiryConnector(service, treasuries);

		const report = await connector.subscribe(
			await inputFile(["INQ0001,91282CJK8,SELL,2000000,100-000,PENDING"]),
		);

		expect(report.processed).toBe(0);
		expect(report.skipped[0]?.lineNumber).toBe(2);
		expect(report.skipped[0]?.reason).toMatch(/^\[5\]: /);
	});

	it("publish leaves a non-received inquiry as it is", () => {
		const service = new InquiryService();
		const connector = new InquiryConnector(service, treasuries);
		const inquiry = { ...service.getData(inquiryId("X")), state: InquiryState.Rejected };

		connector.publish(inquiry);

		expect(inquiry.state).toBe(InquiryState.Rejected);
		expect(service.size).toBe(0);
	});
});
