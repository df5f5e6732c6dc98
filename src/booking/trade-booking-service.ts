/**
 * Booked trades keyed by trade id.
 */

import type { ExecutionOrder } from "../execution/types.js";
import { UNKNOWN_BOND } from "../reference/reference-data.js";
import { cycle } from "../shared/cycle.js";
import { Decimal } from "../shared/decimal.js";
import { type TradeId, tradeId } from "../shared/identifiers.js";
import { TradeSide, tradeSideForAggressed } from "../shared/side.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Listener } from "../soa/types.js";
import { TRADING_BOOKS, type Trade } from "./types.js";

export class TradeBookingService extends KeyedService<TradeId, Trade> {
	constructor(options: ServiceOptions<Trade> = {}) {
		super("trade-booking", options);
	}

	override onMessage(trade: Trade): void {
		this.bookTrade(trade);
	}

	/** Stores the trade and notifies `update`. */
	bookTrade(trade: Trade): void {
		this.logger.info(
			{ tradeId: trade.tradeId, book: trade.book, quantity: trade.quantity, side: trade.side },
			"Booking trade",
		);
		this.storeAndNotify(trade.tradeId, trade, "update");
	}

	protected override zeroValue(id: TradeId): Trade {
		return {
			product: UNKNOWN_BOND,
			tradeId: id,
			price: Decimal.zero(),
			book: "",
			quantity: 0,
			side: TradeSide.Buy,
		};
	}
}

/**
 * Execution listener: books every executed order as a trade.
 * Trade ids are `<ticker>-T<n>`; books rotate through TRADING_BOOKS.
 */
export function tradeBookingListener(service: TradeBookingService): Listener<ExecutionOrder> {
	const nextBook = cycle(TRADING_BOOKS);
	let booked = 0;
	return createListener({
		onAdd: (order) => {
			booked++;
			service.bookTrade({
				product: order.product,
				tradeId: tradeId(`${order.product.ticker}-T${booked}`),
				price: order.price,
				book: nextBook(),
				quantity: order.visibleQuantity + order.hiddenQuantity,
				side: tradeSideForAggressed(order.side),
			});
		},
	});
}
