import { describe, it, expect, vi } from "vitest";
import { EventEmitter } from "./EventEmitter";

interface TestEvents {
	tick: [number];
	done: [];
}

describe("EventEmitter", () => {
	it("delivers typed arguments to listeners", () => {
		const emitter = new EventEmitter<TestEvents>();
		const listener = vi.fn();
		emitter.on("tick", listener);

		expect(emitter.emit("tick", 3)).toBe(true);
		expect(listener).toHaveBeenCalledWith(3);
		expect(emitter.emit("done")).toBe(false);
	});

	it("removes listeners with off", () => {
		const emitter = new EventEmitter<TestEvents>();
		const listener = vi.fn();
		emitter.on("tick", listener).off("tick", listener);
		emitter.emit("tick", 1);
		expect(listener).not.toHaveBeenCalled();
		expect(emitter.listenerCount("tick")).toBe(0);
	});

	it("fires once listeners a single time", () => {
		const emitter = new EventEmitter<TestEvents>();
		const listener = vi.fn();
		emitter.once("done", listener);
		emitter.emit("done");
		emitter.emit("done");
		expect(listener).toHaveBeenCalledTimes(1);
	});

	it("tolerates listeners removing themselves during emit", () => {
		const emitter = new EventEmitter<TestEvents>();
		const seen: string[] = [];
		const first = () => {
			seen.push("first");
			emitter.off("tick", first);
		};
		emitter.on("tick", first);
		emitter.on("tick", () => seen.push("second"));
		emitter.emit("tick", 0);
		emitter.emit("tick", 0);
		expect(seen).toEqual(["first", "second", "second"]);
	});
});
