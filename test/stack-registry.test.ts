import { describe, expect, it, vi } from "vitest";
import { StackRegistry } from "../packages/frames/src/index.js";
import { createContext, createStack } from "./helpers.js";

describe("StackRegistry", () => {
	it("has no active stack for an unknown session", () => {
		const registry = new StackRegistry();
		expect(registry.activeStack("s0")).toBeUndefined();
		expect(registry.allStacks("s0")).toEqual([]);
		expect(registry.depth("s0")).toBe(0);
	});

	it("makes the last pushed stack active and keeps history oldest first", () => {
		const registry = new StackRegistry();
		const outer = createStack(3);
		const inner = createStack(2);
		registry.push("s0", outer);
		registry.push("s0", inner);

		expect(registry.activeStack("s0")).toBe(inner);
		expect(registry.allStacks("s0")).toEqual([outer, inner]);
		expect(registry.depth("s0")).toBe(2);
	});

	it("returns a copy of the history", () => {
		const registry = new StackRegistry();
		registry.push("s0", createStack(1));
		registry.allStacks("s0").pop();
		expect(registry.depth("s0")).toBe(1);
	});

	it("pops and disposes the active stack", () => {
		const registry = new StackRegistry();
		const outer = createStack(3);
		const inner = createStack(2);
		const dispose = vi.spyOn(inner, "dispose");
		registry.push("s0", outer);
		registry.push("s0", inner);

		expect(registry.pop("s0")).toBe(inner);
		expect(dispose).toHaveBeenCalledTimes(1);
		expect(registry.activeStack("s0")).toBe(outer);
	});

	it("returns undefined when there is nothing to pop", () => {
		const registry = new StackRegistry();
		registry.push("s0", createStack(1));
		registry.pop("s0");

		expect(registry.pop("s0")).toBeUndefined();
		expect(registry.sessions()).toEqual([]);
	});

	it("keeps sessions apart", () => {
		const registry = new StackRegistry();
		const a = createStack(2);
		const b = createStack(4);
		registry.push("a", a);
		registry.push("b", b);
		a.moveTo(1);

		expect(registry.activeStack("b")).toBe(b);
		expect(b.currentIndex()).toBe(0);
		registry.pop("a");
		expect(registry.activeStack("b")).toBe(b);
		expect(registry.sessions()).toEqual(["b"]);
	});

	it("reports a prior context for nested stacks or entered stacks", () => {
		const registry = new StackRegistry();
		expect(registry.hasPriorContext("s0")).toBe(false);

		registry.push("s0", createStack(2));
		expect(registry.hasPriorContext("s0")).toBe(false);

		registry.push("s0", createStack(2));
		expect(registry.hasPriorContext("s0")).toBe(true);

		registry.push(
			"s1",
			createStack(2, { priorBinding: createContext({ method: "caller" }) }),
		);
		expect(registry.hasPriorContext("s1")).toBe(true);
	});

	it("disposes every stack when a session ends", () => {
		const registry = new StackRegistry();
		const outer = createStack(3);
		const inner = createStack(2);
		const disposeOuter = vi.spyOn(outer, "dispose");
		const disposeInner = vi.spyOn(inner, "dispose");
		registry.push("s0", outer);
		registry.push("s0", inner);

		registry.endSession("s0");
		expect(disposeOuter).toHaveBeenCalledTimes(1);
		expect(disposeInner).toHaveBeenCalledTimes(1);
		expect(registry.activeStack("s0")).toBeUndefined();
	});
});
