// Per-session nesting history of frame stacks (innermost/active last)

import type { FrameStack } from "./frame-stack.js";

export class StackRegistry {
	private readonly stacks = new Map<string, FrameStack[]>();

	activeStack(sessionId: string): FrameStack | undefined {
		const entries = this.stacks.get(sessionId);
		return entries?.[entries.length - 1];
	}

	allStacks(sessionId: string): FrameStack[] {
		return [...(this.stacks.get(sessionId) ?? [])];
	}

	depth(sessionId: string): number {
		return this.stacks.get(sessionId)?.length ?? 0;
	}

	push(sessionId: string, stack: FrameStack): void {
		const entries = this.stacks.get(sessionId);
		if (entries) {
			entries.push(stack);
		} else {
			this.stacks.set(sessionId, [stack]);
		}
	}

	/** Removes the active stack. Returns undefined when nothing is left to pop. */
	pop(sessionId: string): FrameStack | undefined {
		const entries = this.stacks.get(sessionId);
		const stack = entries?.pop();
		if (entries && entries.length === 0) {
			this.stacks.delete(sessionId);
		}
		stack?.dispose();
		return stack;
	}

	hasPriorContext(sessionId: string): boolean {
		const active = this.activeStack(sessionId);
		if (!active) return false;
		return active.hasPriorContext(this.depth(sessionId));
	}

	endSession(sessionId: string): void {
		for (const stack of this.stacks.get(sessionId) ?? []) {
			stack.dispose();
		}
		this.stacks.delete(sessionId);
	}

	sessions(): string[] {
		return Array.from(this.stacks.keys());
	}
}
