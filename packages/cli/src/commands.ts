// Command handlers for frame navigation
// Each handler receives the stack registry + the target session and returns a Response

import {
	type FrameStack,
	type StackRegistry,
	isNavigationError,
} from "@framenav/frames";
import type { EventStore } from "@framenav/store";
import {
	DEFAULT_HISTORY_LIMIT,
	DEFAULT_LIST_COUNT,
	MAX_HISTORY_LIMIT,
	type ErrResponse,
	type NavigationErrorCode,
	type NavigationSession,
	type Response,
} from "@framenav/types";
import { formatShowStack } from "./format.js";

export const NO_STACK_MESSAGE = "No caller stack available!";

// ─── Movement ───

export function handleUp(
	stacks: StackRegistry,
	session: NavigationSession,
	args?: string,
): Response {
	const stack = stacks.activeStack(session.name);
	if (!stack) return noContext();

	const count = parseCount(args);
	if (count === null) return usage("usage: up [n]");

	// Overshooting the outermost frame stops there instead of failing.
	const target = Math.min(stack.currentIndex() + count, stack.size - 1);
	return moveAndReport(stack, session, target);
}

export function handleDown(
	stacks: StackRegistry,
	session: NavigationSession,
	args?: string,
): Response {
	const stack = stacks.activeStack(session.name);
	if (!stack) return noContext();

	const count = parseCount(args);
	if (count === null) return usage("usage: down [n]");

	const target = stack.currentIndex() - count;
	if (target < 0) {
		return fail("BELOW_BOTTOM", "at bottom of stack, cannot go further!");
	}
	return moveAndReport(stack, session, target);
}

export function handleFrame(
	stacks: StackRegistry,
	session: NavigationSession,
	args?: string,
): Response {
	const stack = stacks.activeStack(session.name);
	if (!stack) return noContext();

	const trimmed = args?.trim() ?? "";
	if (!trimmed) {
		const index = stack.currentIndex();
		return {
			ok: true,
			index,
			total: stack.size,
			value: `#${index} ${stack.renderFrame(index, true)}`,
		};
	}

	if (!/^-?\d+$/.test(trimmed)) return usage("usage: frame [n]");
	const requested = Number.parseInt(trimmed, 10);
	const target = requested < 0 ? stack.size + requested : requested;

	try {
		stack.moveTo(target);
	} catch (error) {
		if (!isNavigationError(error)) throw error;
		return fail(
			error.code,
			`frame ${requested} out of range (0..${stack.size - 1})`,
		);
	}
	return report(stack, session);
}

// ─── Listing ───

export interface ShowStackOptions {
	verbose: boolean;
	head?: number;
	tail?: number;
}

export function handleShowStack(
	stacks: StackRegistry,
	session: NavigationSession,
	args?: string,
): Response {
	const options = parseShowStackArgs(args);
	if (!options) {
		return usage("usage: show-stack [-v] [-H [n]] [-T [n]]");
	}

	const stack = stacks.activeStack(session.name);
	if (!stack) return { ok: true, messages: [NO_STACK_MESSAGE] };

	const [start, end] = selectRange(stack.size, options);
	const lines: Array<{ index: number; text: string; current: boolean }> = [];
	for (let i = start; i < end; i++) {
		lines.push({
			index: i,
			text: stack.renderFrame(i, options.verbose),
			current: i === stack.currentIndex(),
		});
	}

	return {
		ok: true,
		index: stack.currentIndex(),
		total: stack.size,
		value: formatShowStack(stack.size, lines),
	};
}

/** Half-open `[start, end)` range of frames a listing covers. */
export function selectRange(
	size: number,
	options: Pick<ShowStackOptions, "head" | "tail">,
): [number, number] {
	if (options.head !== undefined) return [0, Math.min(options.head, size)];
	if (options.tail !== undefined) return [Math.max(0, size - options.tail), size];
	return [0, size];
}

export function parseShowStackArgs(args?: string): ShowStackOptions | null {
	const tokens = (args ?? "").trim().split(/\s+/).filter(Boolean);
	const options: ShowStackOptions = { verbose: false };

	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i];
		switch (token) {
			case "-v":
			case "--verbose":
				options.verbose = true;
				break;
			case "-H":
			case "--head":
			case "-T":
			case "--tail": {
				let count = DEFAULT_LIST_COUNT;
				const next = tokens[i + 1];
				if (next !== undefined && /^\d+$/.test(next)) {
					count = Number.parseInt(next, 10);
					i++;
				}
				if (token === "-H" || token === "--head") {
					options.head = count;
				} else {
					options.tail = count;
				}
				break;
			}
			default:
				return null;
		}
	}
	return options;
}

// ─── Nesting ───

export function handleExit(
	stacks: StackRegistry,
	session: NavigationSession,
): Response {
	const hadPriorContext = stacks.hasPriorContext(session.name);
	const popped = stacks.pop(session.name);
	if (!popped) return noContext();

	const outer = stacks.activeStack(session.name);
	if (outer) {
		session.anchor = outer.currentFrame().context;
		return {
			ok: true,
			priorContext: hadPriorContext,
			depth: stacks.depth(session.name),
			index: outer.currentIndex(),
			messages: [
				`returned to #${outer.currentIndex()} ${outer.renderFrame(outer.currentIndex())}`,
			],
		};
	}

	session.anchor = popped.priorBinding ?? null;
	return {
		ok: true,
		priorContext: hadPriorContext,
		depth: 0,
		messages: [
			hadPriorContext
				? "returned to prior context"
				: "left the last frame stack",
		],
	};
}

export function handleStacks(
	stacks: StackRegistry,
	session: NavigationSession,
): Response {
	const all = stacks.allStacks(session.name);
	return {
		ok: true,
		columns: ["depth", "frames", "cursor", "source", "active"],
		rows: all.map((stack, i) => [
			i,
			stack.size,
			stack.currentIndex(),
			stack.source ?? "",
			i === all.length - 1,
		]),
	};
}

// ─── Event log ───

export function handleHistory(
	store: EventStore,
	session: NavigationSession,
	args?: string,
): Response {
	const limit = parseHistoryLimit(args);
	if (!Number.isInteger(limit) || limit < 1) {
		return usage("usage: history [limit]");
	}

	const rows = store.query(
		`
		SELECT
			id,
			ts,
			method,
			json_extract(data, '$.args') AS args,
			json_extract(data, '$.ok') AS ok,
			json_extract(data, '$.error') AS error
		FROM events
		WHERE category = 'navigation' AND session_id = ?
		ORDER BY id DESC
		LIMIT ?
	`,
		[session.name, limit],
	);

	return {
		ok: true,
		columns: ["id", "ts", "command", "args", "ok", "error"],
		rows: rows.map((row) => [
			row.id,
			row.ts,
			row.method,
			row.args,
			row.ok,
			row.error,
		]),
	};
}

// ─── Helpers ───

function moveAndReport(
	stack: FrameStack,
	session: NavigationSession,
	target: number,
): Response {
	try {
		stack.moveTo(target);
	} catch (error) {
		if (!isNavigationError(error)) throw error;
		return fail(error.code, error.message);
	}
	return report(stack, session);
}

// Re-anchors the session at the selected frame and describes it.
function report(stack: FrameStack, session: NavigationSession): Response {
	const index = stack.currentIndex();
	session.anchor = stack.currentFrame().context;
	return {
		ok: true,
		index,
		total: stack.size,
		value: `#${index} ${stack.renderFrame(index)}`,
	};
}

export function noContext(): ErrResponse {
	return fail("NO_CONTEXT", "nowhere to go!");
}

function usage(message: string): ErrResponse {
	return fail("USAGE", message);
}

function fail(errorCode: NavigationErrorCode, error: string): ErrResponse {
	return { ok: false, error, errorCode };
}

function parseCount(args?: string): number | null {
	const trimmed = args?.trim() ?? "";
	if (!trimmed) return 1;
	if (!/^\d+$/.test(trimmed)) return null;
	const count = Number.parseInt(trimmed, 10);
	return count >= 1 ? count : null;
}

function parseHistoryLimit(args?: string): number {
	if (!args) return DEFAULT_HISTORY_LIMIT;
	const trimmed = args.trim();
	if (!trimmed) return DEFAULT_HISTORY_LIMIT;
	const parsed = Number.parseInt(trimmed, 10);
	if (Number.isNaN(parsed)) return -1;
	return Math.min(parsed, MAX_HISTORY_LIMIT);
}
