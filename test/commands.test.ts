import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	handleDown,
	handleExit,
	handleFrame,
	handleHistory,
	handleShowStack,
	handleStacks,
	handleUp,
	parseShowStackArgs,
	selectRange,
} from "../packages/cli/src/commands.js";
import type { FrameStack } from "../packages/frames/src/index.js";
import { StackRegistry } from "../packages/frames/src/index.js";
import { EventStore } from "../packages/store/src/index.js";
import type { NavigationSession } from "../packages/types/src/index.js";
import { createContext, createSession, createStack } from "./helpers.js";

describe("commands", () => {
	let stacks: StackRegistry;
	let session: NavigationSession;
	let stack: FrameStack;

	beforeEach(() => {
		stacks = new StackRegistry();
		session = createSession();
		stack = createStack(5);
		stacks.push(session.name, stack);
	});

	describe("up", () => {
		it("moves toward the callers and re-anchors the session", () => {
			const result = handleUp(stacks, session, "2");
			expect(result).toEqual({
				ok: true,
				index: 2,
				total: 5,
				value: "#2 [method]  fn2",
			});
			expect(stack.currentIndex()).toBe(2);
			expect(session.anchor).toBe(stack.frameAt(2).context);
		});

		it("moves one frame by default", () => {
			expect(handleUp(stacks, session)).toMatchObject({ ok: true, index: 1 });
		});

		it("stops at the outermost frame instead of failing", () => {
			expect(handleUp(stacks, session, "1000000")).toMatchObject({
				ok: true,
				index: 4,
			});
			expect(handleUp(stacks, session)).toMatchObject({ ok: true, index: 4 });
		});

		it("rejects counts that are not positive integers", () => {
			for (const args of ["abc", "0", "-1", "1.5"]) {
				expect(handleUp(stacks, session, args)).toEqual({
					ok: false,
					error: "usage: up [n]",
					errorCode: "USAGE",
				});
			}
			expect(stack.currentIndex()).toBe(0);
		});
	});

	describe("down", () => {
		it("is undone by up with the same count", () => {
			stack.moveTo(3);
			expect(handleDown(stacks, session, "2")).toMatchObject({
				ok: true,
				index: 1,
			});
			expect(handleUp(stacks, session, "2")).toMatchObject({
				ok: true,
				index: 3,
			});
		});

		it("fails below the innermost frame and leaves the cursor alone", () => {
			stack.moveTo(2);
			session.anchor = stack.frameAt(2).context;

			expect(handleDown(stacks, session, "3")).toEqual({
				ok: false,
				error: "at bottom of stack, cannot go further!",
				errorCode: "BELOW_BOTTOM",
			});
			expect(stack.currentIndex()).toBe(2);
			expect(session.anchor).toBe(stack.frameAt(2).context);
		});

		it("fails at index 0 with the default count", () => {
			expect(handleDown(stacks, session)).toMatchObject({
				ok: false,
				errorCode: "BELOW_BOTTOM",
			});
		});
	});

	describe("frame", () => {
		it("jumps to an index", () => {
			expect(handleFrame(stacks, session, "3")).toEqual({
				ok: true,
				index: 3,
				total: 5,
				value: "#3 [method]  fn3",
			});
		});

		it("counts negative indexes from the end", () => {
			expect(handleFrame(stacks, session, "-1")).toMatchObject({ index: 4 });
			expect(handleFrame(stacks, session, "-5")).toMatchObject({ index: 0 });
		});

		it("fails for indexes outside the stack", () => {
			stack.moveTo(1);
			expect(handleFrame(stacks, session, "7")).toEqual({
				ok: false,
				error: "frame 7 out of range (0..4)",
				errorCode: "OUT_OF_RANGE",
			});
			expect(handleFrame(stacks, session, "-6")).toEqual({
				ok: false,
				error: "frame -6 out of range (0..4)",
				errorCode: "OUT_OF_RANGE",
			});
			expect(stack.currentIndex()).toBe(1);
		});

		it("describes the current frame verbosely without an index", () => {
			stack.moveTo(1);
			expect(handleFrame(stacks, session)).toEqual({
				ok: true,
				index: 1,
				total: 5,
				value: "#1 [method]  fn1\n      in #<App> @ app.ts:11",
			});
			expect(stack.currentIndex()).toBe(1);
			expect(session.anchor).toBeNull();
		});

		it("rejects non-numeric indexes", () => {
			expect(handleFrame(stacks, session, "top")).toMatchObject({
				ok: false,
				errorCode: "USAGE",
			});
		});
	});

	describe("show-stack", () => {
		it("lists every frame and marks the current one", () => {
			stack.moveTo(1);
			const result = handleShowStack(stacks, session);
			expect(result).toEqual({
				ok: true,
				index: 1,
				total: 5,
				value: [
					"Showing all accessible frames in stack (5 in total):",
					"--",
					"   #0 [method]  fn0",
					"=> #1 [method]  fn1",
					"   #2 [method]  fn2",
					"   #3 [method]  fn3",
					"   #4 [method]  fn4",
				].join("\n"),
			});
		});

		it("lists the last frames with --tail", () => {
			const result = handleShowStack(stacks, session, "-T 2");
			expect(result).toMatchObject({
				ok: true,
				value: [
					"Showing all accessible frames in stack (5 in total):",
					"--",
					"   #3 [method]  fn3",
					"   #4 [method]  fn4",
				].join("\n"),
			});
		});

		it("adds receiver and location with -v", () => {
			const result = handleShowStack(stacks, session, "-v -H 1");
			expect(result).toMatchObject({
				ok: true,
				value: [
					"Showing all accessible frames in stack (5 in total):",
					"--",
					"=> #0 [method]  fn0",
					"      in #<App> @ app.ts:10",
				].join("\n"),
			});
		});

		it("renders each frame once across listings", () => {
			const context = stack.frameAt(0).context;
			handleShowStack(stacks, session);
			handleShowStack(stacks, session, "-H 2");
			expect(context.methodName).toHaveBeenCalledTimes(1);
		});

		it("rejects unknown flags", () => {
			expect(handleShowStack(stacks, session, "--all")).toEqual({
				ok: false,
				error: "usage: show-stack [-v] [-H [n]] [-T [n]]",
				errorCode: "USAGE",
			});
		});
	});

	describe("exit", () => {
		it("returns to the outer stack and re-anchors there", () => {
			stack.moveTo(1);
			stacks.push(session.name, createStack(2));

			expect(handleExit(stacks, session)).toEqual({
				ok: true,
				priorContext: true,
				depth: 1,
				index: 1,
				messages: ["returned to #1 [method]  fn1"],
			});
			expect(stacks.activeStack(session.name)).toBe(stack);
			expect(session.anchor).toBe(stack.frameAt(1).context);
		});

		it("falls back to the prior binding after the last stack", () => {
			const prior = createContext({ method: "caller" });
			const fresh = createSession("s1");
			stacks.push(fresh.name, createStack(2, { priorBinding: prior }));

			expect(handleExit(stacks, fresh)).toEqual({
				ok: true,
				priorContext: true,
				depth: 0,
				messages: ["returned to prior context"],
			});
			expect(fresh.anchor).toBe(prior);
		});

		it("clears the anchor when nothing came before", () => {
			session.anchor = stack.frameAt(0).context;
			expect(handleExit(stacks, session)).toEqual({
				ok: true,
				priorContext: false,
				depth: 0,
				messages: ["left the last frame stack"],
			});
			expect(session.anchor).toBeNull();
			expect(handleExit(stacks, session)).toMatchObject({
				ok: false,
				errorCode: "NO_CONTEXT",
			});
		});
	});

	it("lists the nesting history", () => {
		stacks.push(session.name, createStack(2, { cursor: 1, source: "inner.json" }));
		expect(handleStacks(stacks, session)).toEqual({
			ok: true,
			columns: ["depth", "frames", "cursor", "source", "active"],
			rows: [
				[0, 5, 0, "", false],
				[1, 2, 1, "inner.json", true],
			],
		});
	});

	it("runs the navigation scenario end to end", () => {
		expect(handleUp(stacks, session, "2")).toMatchObject({ index: 2 });

		const listing = handleShowStack(stacks, session, "--head 3");
		expect(listing).toMatchObject({
			ok: true,
			total: 5,
			value: [
				"Showing all accessible frames in stack (5 in total):",
				"--",
				"   #0 [method]  fn0",
				"   #1 [method]  fn1",
				"=> #2 [method]  fn2",
			].join("\n"),
		});

		expect(handleDown(stacks, session, "10")).toMatchObject({
			ok: false,
			errorCode: "BELOW_BOTTOM",
		});
		expect(stack.currentIndex()).toBe(2);

		expect(handleFrame(stacks, session, "-1")).toMatchObject({ index: 4 });
		expect(stack.currentIndex()).toBe(4);
	});

	describe("without an active stack", () => {
		beforeEach(() => {
			stacks.pop(session.name);
		});

		it("fails navigation with NO_CONTEXT", () => {
			const noContext = {
				ok: false,
				error: "nowhere to go!",
				errorCode: "NO_CONTEXT",
			};
			expect(handleUp(stacks, session)).toEqual(noContext);
			expect(handleDown(stacks, session)).toEqual(noContext);
			expect(handleFrame(stacks, session)).toEqual(noContext);
			expect(handleFrame(stacks, session, "1")).toEqual(noContext);
		});

		it("reports that no stack is available from show-stack", () => {
			expect(handleShowStack(stacks, session, "-v")).toEqual({
				ok: true,
				messages: ["No caller stack available!"],
			});
		});
	});
});

describe("parseShowStackArgs", () => {
	it("reads flags with and without counts", () => {
		expect(parseShowStackArgs()).toEqual({ verbose: false });
		expect(parseShowStackArgs("-v -T 3")).toEqual({ verbose: true, tail: 3 });
		expect(parseShowStackArgs("-H")).toEqual({ verbose: false, head: 10 });
		expect(parseShowStackArgs("--tail --verbose")).toEqual({
			verbose: true,
			tail: 10,
		});
	});

	it("returns null for unknown tokens", () => {
		expect(parseShowStackArgs("-H x")).toBeNull();
	});
});

describe("selectRange", () => {
	it("clamps head and tail to the stack", () => {
		expect(selectRange(5, { head: 3 })).toEqual([0, 3]);
		expect(selectRange(5, { head: 8 })).toEqual([0, 5]);
		expect(selectRange(5, { head: 0 })).toEqual([0, 0]);
		expect(selectRange(5, { tail: 2 })).toEqual([3, 5]);
		expect(selectRange(5, { tail: 7 })).toEqual([0, 5]);
		expect(selectRange(5, {})).toEqual([0, 5]);
	});

	it("prefers head over tail", () => {
		expect(selectRange(5, { head: 1, tail: 1 })).toEqual([0, 1]);
	});
});

describe("history", () => {
	let store: EventStore;

	beforeEach(() => {
		store = new EventStore(":memory:");
	});

	afterEach(() => {
		store.close();
	});

	it("lists the session's navigation events, newest first", () => {
		store.record({
			ts: 1000,
			source: "repl",
			category: "navigation",
			method: "up",
			data: { args: "2", ok: true, error: null },
			sessionId: "s0",
		});
		store.record({
			ts: 2000,
			source: "repl",
			category: "navigation",
			method: "down",
			data: { args: "9", ok: false, error: "at bottom of stack, cannot go further!" },
			sessionId: "s0",
		});
		store.record({
			ts: 3000,
			source: "repl",
			category: "navigation",
			method: "up",
			data: { args: null, ok: true, error: null },
			sessionId: "other",
		});

		const result = handleHistory(store, createSession(), "10");
		expect(result).toEqual({
			ok: true,
			columns: ["id", "ts", "command", "args", "ok", "error"],
			rows: [
				[2, 2000, "down", "9", 0, "at bottom of stack, cannot go further!"],
				[1, 1000, "up", "2", 1, null],
			],
		});
	});

	it("rejects a non-numeric limit", () => {
		expect(handleHistory(store, createSession(), "many")).toMatchObject({
			ok: false,
			errorCode: "USAGE",
		});
	});
});
