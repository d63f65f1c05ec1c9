// Snapshot producer: turns a captured call chain saved as JSON into a FrameStack

import * as fs from "node:fs";
import { Frame, FrameStack } from "@framenav/frames";
import type {
	FrameContext,
	MethodSignature,
	ReceiverInfo,
	SourceLocation,
} from "@framenav/types";
import { z } from "zod";

const parameterSchema = z.object({
	kind: z.enum(["required", "optional", "rest", "callback"]),
	name: z.string().min(1).optional(),
});

const signatureSchema = z.object({
	owner: z.string().min(1),
	name: z.string().min(1),
	static: z.boolean().optional(),
	parameters: z.array(parameterSchema).nullable(),
});

export const frameSnapshotSchema = z.object({
	type: z.string().min(1).optional(),
	label: z.string().min(1).optional(),
	method: z.string().min(1).nullable().optional(),
	receiver: z.object({
		kind: z.enum(["module", "class", "instance"]),
		name: z.string(),
	}),
	self: z.string(),
	file: z.string(),
	line: z.number().int().nonnegative(),
	signature: signatureSchema.nullable().optional(),
});

export const stackSnapshotSchema = z
	.object({
		cursor: z.number().int().nonnegative().optional(),
		priorBinding: frameSnapshotSchema.optional(),
		frames: z.array(frameSnapshotSchema).min(1),
	})
	.refine((snapshot) => (snapshot.cursor ?? 0) < snapshot.frames.length, {
		message: "cursor must point at one of the frames",
		path: ["cursor"],
	});

export type FrameSnapshot = z.infer<typeof frameSnapshotSchema>;
export type StackSnapshot = z.infer<typeof stackSnapshotSchema>;

export class SnapshotError extends Error {
	readonly path: string;

	constructor(path: string, message: string) {
		super(message);
		this.name = "SnapshotError";
		this.path = path;
	}
}

/** FrameContext backed by a recorded frame; every answer is fixed at capture time. */
export class SnapshotContext implements FrameContext {
	constructor(private readonly snapshot: FrameSnapshot) {}

	methodName(): string | null {
		return this.snapshot.method ?? null;
	}

	receiver(): ReceiverInfo {
		return this.snapshot.receiver;
	}

	inspectSelf(): string {
		return this.snapshot.self;
	}

	location(): SourceLocation {
		return { file: this.snapshot.file, line: this.snapshot.line };
	}

	signature(): MethodSignature | null {
		return this.snapshot.signature ?? null;
	}
}

export interface LoadStackOptions {
	// Overrides the snapshot's own priorBinding (used when entering a nested stack)
	priorBinding?: FrameContext;
}

export function buildStack(
	snapshot: StackSnapshot,
	source: string,
	options: LoadStackOptions = {},
): FrameStack {
	const frames = snapshot.frames.map(
		(frame) =>
			new Frame(new SnapshotContext(frame), {
				frameType: frame.type,
				frameLabel: frame.label,
			}),
	);
	const prior = snapshot.priorBinding
		? new SnapshotContext(snapshot.priorBinding)
		: undefined;
	return new FrameStack(frames, {
		cursor: snapshot.cursor ?? 0,
		priorBinding: options.priorBinding ?? prior,
		source,
	});
}

export function parseSnapshot(value: unknown, source: string): StackSnapshot {
	const result = stackSnapshotSchema.safeParse(value);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) =>
				issue.path.length > 0
					? `${issue.path.join(".")}: ${issue.message}`
					: issue.message,
			)
			.join("; ");
		throw new SnapshotError(source, `invalid snapshot ${source}: ${issues}`);
	}
	return result.data;
}

export function loadSnapshot(
	path: string,
	options: LoadStackOptions = {},
): FrameStack {
	let text: string;
	try {
		text = fs.readFileSync(path, "utf8");
	} catch (e) {
		throw new SnapshotError(
			path,
			`cannot read snapshot ${path}: ${(e as Error).message}`,
		);
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (e) {
		throw new SnapshotError(
			path,
			`invalid snapshot ${path}: ${(e as Error).message}`,
		);
	}

	return buildStack(parseSnapshot(json, path), path, options);
}
