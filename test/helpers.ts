import { vi } from "vitest";
import {
	Frame,
	FrameStack,
	type FrameStackOptions,
} from "../packages/frames/src/index.js";
import type {
	MethodSignature,
	NavigationSession,
	ReceiverInfo,
} from "../packages/types/src/index.js";

export interface ContextInit {
	method?: string | null;
	receiver?: ReceiverInfo;
	self?: string;
	file?: string;
	line?: number;
	signature?: MethodSignature | null;
}

// FrameContext whose every capability is a spy, so tests can count lookups.
export function createContext(init: ContextInit = {}) {
	return {
		methodName: vi.fn(() => init.method ?? null),
		receiver: vi.fn(
			(): ReceiverInfo => init.receiver ?? { kind: "instance", name: "App" },
		),
		inspectSelf: vi.fn(() => init.self ?? "#<App>"),
		location: vi.fn(() => ({
			file: init.file ?? "app.ts",
			line: init.line ?? 1,
		})),
		signature: vi.fn(() => init.signature ?? null),
	};
}

// Frame i is "[method]  fn<i>" at app.ts:<10 + i>
export function createStack(
	count: number,
	options: FrameStackOptions = {},
): FrameStack {
	const frames: Frame[] = [];
	for (let i = 0; i < count; i++) {
		frames.push(
			new Frame(createContext({ method: `fn${i}`, line: 10 + i }), {
				frameType: "method",
			}),
		);
	}
	return new FrameStack(frames, options);
}

export function createSession(name = "s0"): NavigationSession {
	return { name, anchor: null };
}
