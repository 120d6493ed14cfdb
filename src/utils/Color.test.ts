import { describe, it, expect } from "vitest";
import { Color } from "./Color";

describe("Color", () => {
	it("clamps and rounds channels", () => {
		const c = new Color(-10, 127.6, 300);
		expect([c.r, c.g, c.b]).toEqual([0, 128, 255]);
	});

	it("collapses NaN to 0", () => {
		expect(new Color(NaN, 1, 2).r).toBe(0);
	});

	it("truncates unit colours", () => {
		const c = Color.fromUnit({ x: 0.5, y: 1.2, z: -0.1 });
		expect([c.r, c.g, c.b]).toEqual([127, 255, 0]);
	});

	it("round-trips hex", () => {
		const c = Color.fromHex(0x12ab9f);
		expect([c.r, c.g, c.b]).toEqual([0x12, 0xab, 0x9f]);
		expect(c.toHex()).toBe(0x12ab9f);
	});

	it("saturates on add", () => {
		const c = new Color(200, 10, 0).add({ r: 100, g: 5, b: 0 });
		expect(c.equals({ r: 255, g: 15, b: 0 })).toBe(true);
	});

	it("lerps and scales", () => {
		expect(Color.black().lerp({ r: 100, g: 200, b: 50 }, 0.5).toString()).toBe(
			"rgb(50, 100, 25)"
		);
		expect(new Color(10, 20, 30).scale(2).magnitude()).toBe(120);
	});
});
