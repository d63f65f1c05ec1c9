// One navigable call chain: an immutable list of frames and a cursor into it

import type { FrameContext } from "@framenav/types";
import { frameInfo } from "./describe.js";
import { NavigationError } from "./errors.js";
import type { Frame } from "./frame.js";

export interface FrameStackOptions {
	cursor?: number;
	// Context that was active before this stack was entered
	priorBinding?: FrameContext;
	// Where the frames came from, shown in stack listings
	source?: string;
}

export class FrameStack {
	readonly frames: readonly Frame[];
	readonly priorBinding?: FrameContext;
	readonly source?: string;
	private cursor = 0;
	private readonly renderCache = new Map<string, string>();

	constructor(frames: Frame[], options: FrameStackOptions = {}) {
		if (frames.length === 0) {
			throw new NavigationError(
				"OUT_OF_RANGE",
				"a frame stack needs at least one frame",
			);
		}
		this.frames = Object.freeze([...frames]);
		this.priorBinding = options.priorBinding;
		this.source = options.source;
		this.moveTo(options.cursor ?? 0);
	}

	get size(): number {
		return this.frames.length;
	}

	currentIndex(): number {
		return this.cursor;
	}

	frameAt(index: number): Frame {
		this.assertInRange(index);
		return this.frames[index];
	}

	currentFrame(): Frame {
		return this.frames[this.cursor];
	}

	/**
	 * Strict: any target outside `[0, size)` throws `OUT_OF_RANGE` and leaves
	 * the cursor where it was. Clamping is the caller's decision.
	 */
	moveTo(targetIndex: number): void {
		this.assertInRange(targetIndex);
		this.cursor = targetIndex;
	}

	moveRelative(delta: number): void {
		this.moveTo(this.cursor + delta);
	}

	/**
	 * Whether leaving this stack lands somewhere: it was entered from another
	 * context, or the registry holds outer stacks for the same session.
	 */
	hasPriorContext(stackCount = 1): boolean {
		return this.priorBinding !== undefined || stackCount > 1;
	}

	renderFrame(index: number, verbose = false): string {
		const frame = this.frameAt(index);
		const key = `${verbose ? "v" : "n"}:${index}`;
		const cached = this.renderCache.get(key);
		if (cached !== undefined) return cached;

		const rendered = frameInfo(frame, verbose);
		this.renderCache.set(key, rendered);
		return rendered;
	}

	dispose(): void {
		this.renderCache.clear();
	}

	private assertInRange(index: number): void {
		if (!Number.isInteger(index) || index < 0 || index >= this.frames.length) {
			throw new NavigationError(
				"OUT_OF_RANGE",
				`frame ${index} out of range (0..${this.frames.length - 1})`,
				{ index, size: this.frames.length },
			);
		}
	}
}
