// Output formatting: plain text listings, TSV and JSON modes
// All output goes to stdout. Errors go to stderr.

import type { Response } from "@framenav/types";

export function formatTsv(columns: string[], rows: unknown[][]): string {
	const header = columns.join("\t");
	const body = rows.map((row) => row.map(formatCell).join("\t")).join("\n");
	return body ? `${header}\n${body}` : header;
}

export function formatJson(columns: string[], rows: unknown[][]): string {
	const objects = rows.map((row) => {
		const obj: Record<string, unknown> = {};
		for (let i = 0; i < columns.length; i++) {
			obj[columns[i]] = row[i];
		}
		return obj;
	});
	return JSON.stringify(objects);
}

function formatCell(value: unknown): string {
	if (value === null || value === undefined) return "";
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean")
		return String(value);
	return JSON.stringify(value);
}

export function formatShowStack(
	total: number,
	frames: Array<{ index: number; text: string; current: boolean }>,
): string {
	const lines = [
		`Showing all accessible frames in stack (${total} in total):`,
		"--",
	];
	for (const frame of frames) {
		const marker = frame.current ? "=>" : "  ";
		lines.push(`${marker} #${frame.index} ${frame.text}`);
	}
	return lines.join("\n");
}

export function formatResponse(
	response: Response,
	jsonMode = false,
): string {
	if (!response.ok) return "";

	const r = response;

	// Tabular data (stacks, history, ss)
	if (r.columns && r.rows) {
		return jsonMode
			? formatJson(r.columns, r.rows)
			: formatTsv(r.columns, r.rows);
	}

	// Frame descriptions and listings
	if (r.value !== undefined) {
		return r.value;
	}

	// Messages (open, enter, exit, close, show-stack without a stack)
	if (r.messages) {
		return r.messages.join("\n");
	}

	return "";
}
