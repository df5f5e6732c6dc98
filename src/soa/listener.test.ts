import { describe, expect, it, vi } from "vitest";
import { createListener } from "./listener.js";

describe("createListener", () => {
	it("uses the given callbacks", () => {
		const onAdd = vi.fn();
		const listener = createListener<number>({ onAdd });
		listener.onAdd(7);
		expect(onAdd).toHaveBeenCalledWith(7);
	});

	it("fills missing callbacks with no-ops", () => {
		const listener = createListener<number>({});
		expect(() => {
			listener.onAdd(1);
			listener.onUpdate(1);
			listener.onRemove(1);
		}).not.toThrow();
	});
});
