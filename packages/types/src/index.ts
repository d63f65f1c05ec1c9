// Shared protocol, frame-context and configuration types used across packages.

export const EVENTS_DB_PATH =
	process.env.FRAMENAV_EVENTS_DB ?? "/tmp/framenav-events.db";

// show-stack -H / -T without a count
export const DEFAULT_LIST_COUNT = 10;
// self descriptions longer than this collapse to #<Name>
export const SELF_CLIP_WIDTH = 60;
export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 1000;

// ─── Frame contexts (supplied by producers) ───

export type ReceiverKind = "module" | "class" | "instance";

export interface ReceiverInfo {
	kind: ReceiverKind;
	name: string;
}

export interface SourceLocation {
	file: string;
	line: number;
}

export type ParameterKind = "required" | "optional" | "rest" | "callback";

export interface ParameterInfo {
	kind: ParameterKind;
	name?: string;
}

export interface MethodSignature {
	owner: string;
	name: string;
	static?: boolean;
	// null when the method can no longer be resolved on its owner
	parameters: ParameterInfo[] | null;
}

/**
 * Read-only view of one captured execution context.
 *
 * The navigation core never creates, copies or releases a context; it only
 * asks it to describe itself when a frame is rendered.
 */
export interface FrameContext {
	/** Name of the enclosing function or method, or null at module/class level. */
	methodName(): string | null;
	receiver(): ReceiverInfo;
	/** Evaluated description of the receiver ("what is self here"). */
	inspectSelf(): string;
	location(): SourceLocation;
	signature(): MethodSignature | null;
}

// ─── Errors ───

export type NavigationErrorCode =
	| "NO_CONTEXT"
	| "BELOW_BOTTOM"
	| "OUT_OF_RANGE"
	| "USAGE";

// ─── Command surface ───

// All commands carry an optional session name `s` for multi-session targeting.
export type Command = { s?: string } & (
	| { cmd: "up"; args?: string } // frame count
	| { cmd: "down"; args?: string } // frame count
	| { cmd: "frame"; args?: string } // index, negative counts from the end
	| { cmd: "show-stack"; args?: string } // [-v] [-H [n]] [-T [n]]
	| { cmd: "exit" }
	| { cmd: "stacks" }
	| { cmd: "open"; args: string } // snapshot path [session-name]
	| { cmd: "enter"; args: string } // snapshot path
	| { cmd: "close" }
	| { cmd: "ss" }
	| { cmd: "use"; args: string }
	| { cmd: "history"; args?: string } // limit
);

export type CommandName = Command["cmd"];

export interface OkResponse {
	ok: true;
	// Navigation
	index?: number;
	total?: number;
	value?: string;
	// Tabular output (stacks, history)
	columns?: string[];
	rows?: unknown[][];
	// exit
	priorContext?: boolean;
	depth?: number;
	messages?: string[];
	// Session info
	s?: string;
	sessions?: SessionInfo[];
}

export interface ErrResponse {
	ok: false;
	error: string;
	errorCode?: NavigationErrorCode;
}

export type Response = OkResponse | ErrResponse;

export interface SessionInfo {
	name: string;
	depth: number;
	frames: number;
	cursor: number | null;
	current: boolean;
}

// ─── Sessions ───

export interface NavigationSession {
	name: string;
	// Context the session evaluates in; re-pointed on every frame move
	anchor: FrameContext | null;
}
