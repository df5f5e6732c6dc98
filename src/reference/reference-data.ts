/**
 * ReferenceData: static instrument data loaded once at startup.
 *
 * Every service resolves CUSIPs through this lookup; a product that is not
 * listed here is rejected at the connector boundary.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z, validate } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError, ReferenceDataError } from "../shared/errors.js";
import { type ProductId, productId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Bond, BondRecord, BucketedSector } from "./types.js";

/** The bundled US Treasury set: 2Y through 30Y in three sectors. */
export const DEFAULT_REFERENCE_DATA_PATH = fileURLToPath(
	new URL("../../data/reference/bonds.json", import.meta.url),
);

const decimalText = z
	.union([z.string(), z.number()])
	.transform((v) => String(v).trim())
	.pipe(z.string().regex(/^-?\d+(\.\d+)?$/, "expected a decimal number"))
	.transform((v) => Decimal.from(v));

const bondRecordSchema = z.object({
	cusip: z.string().trim().min(1),
	ticker: z.string().trim().min(1),
	coupon: decimalText,
	maturity: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
	pv01: decimalText,
	sector: z.string().trim().min(1),
});

const referenceFileSchema = z.object({
	bonds: z.array(bondRecordSchema).min(1),
});

/** Bond returned for a product the reference data does not list. */
export function placeholderBond(id: ProductId): Bond {
	return { productId: id, ticker: "", coupon: Decimal.zero(), maturity: "" };
}

/** Bond of a zero value whose key does not identify a product, such as an unknown trade id. */
export const UNKNOWN_BOND: Bond = placeholderBond(productId("UNKNOWN"));

export class ReferenceData {
	private readonly bonds = new Map<ProductId, Bond>();
	private readonly pv01s = new Map<ProductId, Decimal>();
	private readonly sectorsByName = new Map<string, BucketedSector>();
	private readonly sectorByProduct = new Map<ProductId, string>();

	private constructor(records: readonly BondRecord[]) {
		const members = new Map<string, Bond[]>();
		for (const record of records) {
			const id = productId(record.cusip);
			const bond: Bond = {
				productId: id,
				ticker: record.ticker,
				coupon: record.coupon,
				maturity: record.maturity,
			};
			this.bonds.set(id, bond);
			this.pv01s.set(id, record.pv01);
			this.sectorByProduct.set(id, record.sector);
			const list = members.get(record.sector) ?? [];
			list.push(bond);
			members.set(record.sector, list);
		}
		for (const [name, list] of members) {
			this.sectorsByName.set(name, { name, members: list });
		}
	}

	/**
	 * Builds the lookup from validated records.
	 * @throws ConfigError if a CUSIP appears twice
	 */
	static fromRecords(records: readonly BondRecord[]): ReferenceData {
		const seen = new Set<string>();
		for (const record of records) {
			if (seen.has(record.cusip)) {
				throw new ConfigError(`Duplicate CUSIP in reference data: ${record.cusip}`, {
					cusip: record.cusip,
				});
			}
			seen.add(record.cusip);
		}
		return new ReferenceData(records);
	}

	bond(id: ProductId): Bond | undefined {
		return this.bonds.get(id);
	}

	bondOrPlaceholder(id: ProductId): Bond {
		return this.bonds.get(id) ?? placeholderBond(id);
	}

	/** Resolves raw text from an input record to a known bond. */
	resolve(text: string): Result<Bond, ReferenceDataError> {
		const trimmed = text.trim();
		const bond = trimmed.length > 0 ? this.bonds.get(productId(trimmed)) : undefined;
		if (bond === undefined) {
			return err(new ReferenceDataError(`Unknown product: ${trimmed}`, { productId: trimmed }));
		}
		return ok(bond);
	}

	pv01(id: ProductId): Decimal | undefined {
		return this.pv01s.get(id);
	}

	/** Products in file order. */
	productIds(): ProductId[] {
		return [...this.bonds.keys()];
	}

	sector(name: string): BucketedSector | undefined {
		return this.sectorsByName.get(name);
	}

	sectors(): BucketedSector[] {
		return [...this.sectorsByName.values()];
	}

	sectorOf(id: ProductId): BucketedSector | undefined {
		const name = this.sectorByProduct.get(id);
		return name === undefined ? undefined : this.sectorsByName.get(name);
	}
}

/** Validates already-parsed JSON and builds the lookup. */
export function parseReferenceData(json: unknown): Result<ReferenceData, ConfigError> {
	const parsed = validate(referenceFileSchema, json);
	if (!parsed.ok) {
		return err(
			new ConfigError(`Invalid reference data: ${parsed.error.describe()}`, {
				cause: parsed.error,
			}),
		);
	}
	try {
		return ok(ReferenceData.fromRecords(parsed.value.bonds));
	} catch (error: unknown) {
		if (error instanceof ConfigError) return err(error);
		throw error;
	}
}

/** Reads and validates a reference-data JSON file. */
export async function loadReferenceData(
	path: string = DEFAULT_REFERENCE_DATA_PATH,
): Promise<Result<ReferenceData, ConfigError>> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (error: unknown) {
		return err(new ConfigError(`Cannot read reference data at ${path}`, { cause: error, path }));
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (error: unknown) {
		return err(new ConfigError(`Reference data at ${path} is not JSON`, { cause: error, path }));
	}
	return parseReferenceData(json);
}
