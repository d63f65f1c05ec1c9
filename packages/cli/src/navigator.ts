// Session host: owns the stack registry, resolves the target session for each
// command and dispatches to the navigation handlers. Every dispatched command
// is recorded in the event log.

import { type FrameStack, StackRegistry } from "@framenav/frames";
import type { EventStore } from "@framenav/store";
import type {
	Command,
	NavigationSession,
	Response,
	SessionInfo,
} from "@framenav/types";
import {
	NO_STACK_MESSAGE,
	handleDown,
	handleExit,
	handleFrame,
	handleHistory,
	handleShowStack,
	handleStacks,
	handleUp,
	noContext,
} from "./commands.js";
import { type LoadStackOptions, SnapshotError, loadSnapshot } from "./snapshot.js";

export type StackLoader = (path: string, options: LoadStackOptions) => FrameStack;

export interface NavigatorOptions {
	store?: EventStore | null;
	loadStack?: StackLoader;
}

export class Navigator {
	readonly stacks = new StackRegistry();
	private readonly sessions = new Map<string, NavigationSession>();
	private current: string | null = null;
	private sessionCounter = 0;
	private readonly store: EventStore | null;
	private readonly loadStack: StackLoader;

	constructor(options: NavigatorOptions = {}) {
		this.store = options.store ?? null;
		this.loadStack = options.loadStack ?? loadSnapshot;
	}

	get currentSession(): NavigationSession | null {
		return this.current ? (this.sessions.get(this.current) ?? null) : null;
	}

	getSession(name: string): NavigationSession | undefined {
		return this.sessions.get(name);
	}

	// ─── Producer entry points ───

	/** Starts a session whose first stack is `stack`; it becomes the current session. */
	openSession(stack: FrameStack, name?: string): Response {
		const sessionName = name ?? this.nextSessionName();
		if (this.sessions.has(sessionName)) {
			return { ok: false, error: "session already exists; close it first" };
		}

		const session: NavigationSession = {
			name: sessionName,
			anchor: stack.currentFrame().context,
		};
		this.sessions.set(sessionName, session);
		this.stacks.push(sessionName, stack);
		this.current = sessionName;

		this.store?.record({
			source: "repl",
			category: "lifecycle",
			method: "session.open",
			data: { frames: stack.size, source: stack.source ?? null },
			sessionId: sessionName,
		});

		return {
			ok: true,
			s: sessionName,
			index: stack.currentIndex(),
			total: stack.size,
			messages: [
				`opened ${sessionName} (${stack.size} frames) at #${stack.currentIndex()} ${stack.renderFrame(stack.currentIndex())}`,
			],
		};
	}

	/** Nests `stack` on top of the session's active stack and re-anchors there. */
	enterStack(session: NavigationSession, stack: FrameStack): Response {
		this.stacks.push(session.name, stack);
		session.anchor = stack.currentFrame().context;
		const depth = this.stacks.depth(session.name);
		return {
			ok: true,
			s: session.name,
			depth,
			index: stack.currentIndex(),
			total: stack.size,
			messages: [
				`entered stack ${depth - 1} (${stack.size} frames) at #${stack.currentIndex()} ${stack.renderFrame(stack.currentIndex())}`,
			],
		};
	}

	closeSession(name: string): Response {
		if (!this.sessions.has(name)) {
			return { ok: false, error: `unknown session: ${name}` };
		}
		this.stacks.endSession(name);
		this.sessions.delete(name);

		if (this.current === name) {
			const firstRemaining = this.sessions.keys().next().value;
			this.current = firstRemaining ?? null;
		}

		this.store?.record({
			source: "repl",
			category: "lifecycle",
			method: "session.close",
			sessionId: name,
		});
		return { ok: true, messages: [`closed ${name}`] };
	}

	closeAll(): void {
		for (const name of Array.from(this.sessions.keys())) {
			this.closeSession(name);
		}
	}

	// ─── Dispatch ───

	dispatch(cmd: Command): Response {
		const target = cmd.s ?? this.current;
		const response = this.route(cmd);
		this.store?.record({
			source: "repl",
			category: "navigation",
			method: cmd.cmd,
			data: {
				args: "args" in cmd ? (cmd.args ?? null) : null,
				ok: response.ok,
				error: response.ok ? null : response.error,
				errorCode: response.ok ? null : (response.errorCode ?? null),
				index: response.ok ? (response.index ?? null) : null,
			},
			sessionId: (response.ok ? response.s : undefined) ?? target,
		});
		return response;
	}

	private route(cmd: Command): Response {
		switch (cmd.cmd) {
			case "open":
				return this.handleOpen(cmd.args, cmd.s);
			case "ss":
				return this.handleSessions();
			case "use":
				return this.handleUse(cmd.args);
			default: {
				if (cmd.s && !this.sessions.has(cmd.s)) {
					return { ok: false, error: `unknown session: ${cmd.s}` };
				}
				const session = cmd.s
					? this.sessions.get(cmd.s)
					: this.currentSession;
				if (!session) return this.withoutSession(cmd);
				return this.dispatchToSession(cmd, session);
			}
		}
	}

	private dispatchToSession(
		cmd: Command,
		session: NavigationSession,
	): Response {
		switch (cmd.cmd) {
			case "up":
				return handleUp(this.stacks, session, cmd.args);
			case "down":
				return handleDown(this.stacks, session, cmd.args);
			case "frame":
				return handleFrame(this.stacks, session, cmd.args);
			case "show-stack":
				return handleShowStack(this.stacks, session, cmd.args);
			case "exit":
				return handleExit(this.stacks, session);
			case "stacks":
				return handleStacks(this.stacks, session);
			case "enter":
				return this.handleEnter(session, cmd.args);
			case "close":
				return this.closeSession(session.name);
			case "history":
				if (!this.store) return { ok: false, error: "event log disabled" };
				return handleHistory(this.store, session, cmd.args);
			default:
				return { ok: false, error: `unsupported command: ${cmd.cmd}` };
		}
	}

	// Navigation without any session behaves like a session with no stack.
	private withoutSession(cmd: Command): Response {
		switch (cmd.cmd) {
			case "up":
			case "down":
			case "frame":
			case "exit":
				return noContext();
			case "show-stack":
				return { ok: true, messages: [NO_STACK_MESSAGE] };
			case "close":
				return { ok: true, messages: ["no sessions to close"] };
			default:
				return { ok: false, error: "no active session; use open first" };
		}
	}

	// ─── Session commands ───

	private handleOpen(args: string, sessionName?: string): Response {
		const [path, nameArg] = args.trim().split(/\s+/);
		if (!path) return { ok: false, error: "usage: open <snapshot.json> [name]" };
		const name = nameArg ?? sessionName;
		if (name && this.sessions.has(name)) {
			return { ok: false, error: "session already exists; close it first" };
		}

		const loaded = this.load(path, {});
		if ("error" in loaded) return { ok: false, error: loaded.error };
		return this.openSession(loaded.stack, name);
	}

	private handleEnter(session: NavigationSession, args: string): Response {
		const path = args.trim();
		if (!path) return { ok: false, error: "usage: enter <snapshot.json>" };

		const loaded = this.load(path, {
			priorBinding: session.anchor ?? undefined,
		});
		if ("error" in loaded) return { ok: false, error: loaded.error };
		return this.enterStack(session, loaded.stack);
	}

	private handleSessions(): Response {
		const infos: SessionInfo[] = [];
		for (const [name] of this.sessions) {
			const active = this.stacks.activeStack(name);
			infos.push({
				name,
				depth: this.stacks.depth(name),
				frames: active?.size ?? 0,
				cursor: active ? active.currentIndex() : null,
				current: name === this.current,
			});
		}
		return {
			ok: true,
			sessions: infos,
			columns: ["name", "depth", "frames", "cursor", "current"],
			rows: infos.map((info) => [
				info.name,
				info.depth,
				info.frames,
				info.cursor,
				info.current,
			]),
		};
	}

	private handleUse(name: string): Response {
		const trimmed = name.trim();
		if (!this.sessions.has(trimmed)) {
			return { ok: false, error: `unknown session: ${trimmed}` };
		}
		this.current = trimmed;
		return { ok: true, s: trimmed, messages: [`using ${trimmed}`] };
	}

	private load(
		path: string,
		options: LoadStackOptions,
	): { stack: FrameStack } | { error: string } {
		try {
			return { stack: this.loadStack(path, options) };
		} catch (error) {
			if (error instanceof SnapshotError) return { error: error.message };
			throw error;
		}
	}

	private nextSessionName(): string {
		while (this.sessions.has(`s${this.sessionCounter}`)) {
			this.sessionCounter++;
		}
		return `s${this.sessionCounter++}`;
	}
}
