import { describe, expect, it } from "vitest";
import { US2Y, US10Y, treasuries } from "../__tests__/helpers.js";
import { OrderType } from "../execution/types.js";
import { InquiryState } from "../inquiry/types.js";
import { Position } from "../position/position.js";
import { Decimal } from "../shared/decimal.js";
import { inquiryId, orderId } from "../shared/identifiers.js";
import { PricingSide, TradeSide } from "../shared/side.js";
import { zeroStream } from "../streaming/algo-streaming-service.js";
import {
	formatExecution,
	formatInquiry,
	formatPosition,
	formatStream,
	riskFormatter,
} from "./formatters.js";

const TS = "2024-01-02T03:04:05.006Z";
const us2y = treasuries.bondOrPlaceholder(US2Y);

describe("historical line formats", () => {
	it("position: every book then the aggregate", () => {
		const position = new Position(us2y);
		position.addPosition("TRSY1", 1_000_000);
		position.addPosition("TRSY3", -250_000);
		expect(formatPosition(position, TS)).toEqual([
			`${TS},91282CJL6,TRSY1,1000000,TRSY2,0,TRSY3,-250000,AGGREGATE,750000`,
		]);
	});

	it("risk: the product line followed by its sector line", () => {
		const bucket = {
			product: { name: "FrontEnd", members: [us2y] },
			pv01: Decimal.from("0.0175"),
			quantity: 4_000_000,
		};
		const format = riskFormatter((id) => (id === US2Y ? bucket : undefined));
		expect(format({ product: us2y, pv01: Decimal.from("0.01"), quantity: 1_000_000 }, TS)).toEqual([
			`${TS},91282CJL6,0.01,1000000`,
			`${TS},FrontEnd,0.0175,4000000`,
		]);
		const us10y = treasuries.bondOrPlaceholder(US10Y);
		expect(format({ product: us10y, pv01: Decimal.from("0.05"), quantity: 0 }, TS)).toEqual([
			`${TS},91282CJJ1,0.05,0`,
		]);
	});

	it("execution: side, order, fractional price, sizes and child flag", () => {
		expect(
			formatExecution(
				{
					product: us2y,
					side: PricingSide.Offer,
					orderId: orderId("US2Y-A1"),
					orderType: OrderType.Market,
					price: Decimal.from("99.515625"),
					visibleQuantity: 500_000,
					hiddenQuantity: 1_500_000,
					parentOrderId: "",
					isChildOrder: false,
				},
				TS,
			),
		).toEqual([`${TS},91282CJL6,OFFER,US2Y-A1,MARKET,99-16+,500000,1500000,NO`]);
	});

	it("streaming: one line per side", () => {
		const stream = zeroStream(us2y);
		expect(formatStream(stream, TS)).toEqual([
			`${TS},91282CJL6,BID,0-000,0,0`,
			`${TS},91282CJL6,OFFER,0-000,0,0`,
		]);
	});

	it("inquiry: upper-case side and state", () => {
		expect(
			formatInquiry(
				{
					inquiryId: inquiryId("INQ7"),
					product: us2y,
					side: TradeSide.Sell,
					quantity: 3_000_000,
					price: Decimal.from(100),
					state: InquiryState.CustomerRejected,
				},
				TS,
			),
		).toEqual([`${TS},INQ7,91282CJL6,SELL,3000000,100-000,CUSTOMER_REJECTED`]);
	});
});
