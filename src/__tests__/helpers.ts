import { type ReferenceData, loadReferenceData } from "../reference/index.js";
import { type ProductId, productId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";

/** The bundled treasury set, loaded once per test file. */
export const treasuries: ReferenceData = unwrap(await loadReferenceData());

export const US2Y: ProductId = productId("91282CJL6");
export const US3Y: ProductId = productId("91282CJK8");
export const US5Y: ProductId = productId("91282CJN2");
export const US7Y: ProductId = productId("91282CJM4");
export const US10Y: ProductId = productId("91282CJJ1");
export const US20Y: ProductId = productId("912810TW8");
export const US30Y: ProductId = productId("912810TV0");
