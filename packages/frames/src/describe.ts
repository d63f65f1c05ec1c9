// Plain-text descriptions of frames, as listed by show-stack and frame

import {
	type FrameContext,
	type MethodSignature,
	type ParameterInfo,
	SELF_CLIP_WIDTH,
} from "@framenav/types";
import type { Frame } from "./frame.js";

// Frame type tags are padded so labels line up in a listing.
const TYPE_COLUMN_WIDTH = 9;

/**
 * Label for a frame whose producer supplied none: the enclosing method name,
 * `<module:Name>` / `<class:Name>` for bodies of type-like receivers, and
 * `<top-level>` otherwise.
 */
export function frameDescription(context: FrameContext): string {
	const method = context.methodName();
	if (method) return method;

	const receiver = context.receiver();
	if (receiver.kind === "module") return `<module:${receiver.name}>`;
	if (receiver.kind === "class") return `<class:${receiver.name}>`;
	return "<top-level>";
}

export function signatureWithOwner(signature: MethodSignature): string {
	const separator = signature.static ? "." : "#";
	const qualified = `${signature.owner}${separator}${signature.name}`;
	if (signature.parameters === null) {
		return `${qualified}(UNKNOWN) (undefined method)`;
	}
	const params = signature.parameters.map(formatParameter);
	return `${qualified}(${params.join(", ")})`;
}

function formatParameter(param: ParameterInfo, position: number): string {
	const name =
		param.name ?? (param.kind === "callback" ? "block" : `arg${position + 1}`);
	switch (param.kind) {
		case "required":
			return name;
		case "optional":
			return `${name}=?`;
		case "rest":
			return `...${name}`;
		case "callback":
			return `&${name}`;
	}
}

export function clipSelf(context: FrameContext): string {
	const text = context.inspectSelf();
	if (text.length <= SELF_CLIP_WIDTH) return text;
	return `#<${context.receiver().name}>`;
}

export function frameInfo(frame: Frame, verbose = false): string {
	const { context } = frame;
	const parts: string[] = [];
	if (frame.frameType) {
		parts.push(`[${frame.frameType}]`.padEnd(TYPE_COLUMN_WIDTH));
	}
	parts.push(frame.frameLabel ?? frameDescription(context));

	const signature = context.signature();
	if (signature) parts.push(`<${signatureWithOwner(signature)}>`);

	const summary = parts.join(" ");
	if (!verbose) return summary;

	const { file, line } = context.location();
	return `${summary}\n      in ${clipSelf(context)} @ ${file}:${line}`;
}
