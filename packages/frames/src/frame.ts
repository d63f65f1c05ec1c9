// A captured execution context plus the tags its producer attached to it

import type { FrameContext } from "@framenav/types";

export interface FrameInit {
	frameType?: string;
	frameLabel?: string;
}

export class Frame {
	readonly context: FrameContext;
	readonly frameType?: string;
	readonly frameLabel?: string;

	constructor(context: FrameContext, init: FrameInit = {}) {
		this.context = context;
		this.frameType = init.frameType;
		this.frameLabel = init.frameLabel;
	}
}
