/**
 * Position: signed quantity per book for one product.
 *
 * Mutable: the position service adds each trade in place, so every listener
 * holding the position sees the latest quantities.
 */

import type { Bond } from "../reference/types.js";

export class Position {
	readonly product: Bond;
	private readonly byBook = new Map<string, number>();

	constructor(product: Bond) {
		this.product = product;
	}

	/** Quantity held in `book`; 0 for a book never traded. */
	getPosition(book: string): number {
		return this.byBook.get(book) ?? 0;
	}

	/** Adds a signed quantity to `book`. */
	addPosition(book: string, quantity: number): void {
		this.byBook.set(book, this.getPosition(book) + quantity);
	}

	/** Sum across all books. */
	getAggregatePosition(): number {
		let total = 0;
		for (const quantity of this.byBook.values()) total += quantity;
		return total;
	}

	/** Books traded so far, in first-trade order. */
	books(): string[] {
		return [...this.byBook.keys()];
	}
}
