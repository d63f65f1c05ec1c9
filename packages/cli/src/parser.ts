// Parses one REPL line into a Command: [@session] <command> [args] [\j]

import type { Command } from "@framenav/types";

export type ParsedLine =
	| { kind: "command"; cmd: Command; jsonMode: boolean }
	| { kind: "help" }
	| { kind: "quit" }
	| { kind: "empty" }
	| { kind: "error"; message: string };

export function parseLine(line: string): ParsedLine {
	let tokens = line.trim().split(/\s+/).filter(Boolean);
	if (tokens.length === 0) return { kind: "empty" };

	// @name prefix targets a session for this command: @be up 2
	let sessionName: string | undefined;
	if (tokens[0].startsWith("@")) {
		sessionName = tokens[0].slice(1);
		tokens = tokens.slice(1);
		if (!sessionName) return { kind: "error", message: "missing session name after @" };
		if (tokens.length === 0) {
			return { kind: "error", message: "missing command after @session" };
		}
	}

	// \j suffix switches tabular output to JSON
	let jsonMode = false;
	const last = tokens[tokens.length - 1];
	if (last.endsWith("\\j")) {
		jsonMode = true;
		const stripped = last.slice(0, -2);
		tokens = stripped
			? [...tokens.slice(0, -1), stripped]
			: tokens.slice(0, -1);
		if (tokens.length === 0) return { kind: "empty" };
	}

	const [command, ...restTokens] = tokens;
	const rest = restTokens.join(" ");

	function withSession<T extends Command>(cmd: T): ParsedLine {
		if (sessionName) cmd.s = sessionName;
		return { kind: "command", cmd, jsonMode };
	}

	switch (command) {
		case "help":
		case "?":
			return { kind: "help" };

		case "quit":
		case "q":
			return { kind: "quit" };

		case "up":
			return withSession({ cmd: "up", args: rest || undefined });

		case "down":
			return withSession({ cmd: "down", args: rest || undefined });

		case "frame":
			return withSession({ cmd: "frame", args: rest || undefined });

		case "show-stack":
			return withSession({ cmd: "show-stack", args: rest || undefined });

		case "exit":
			return withSession({ cmd: "exit" });

		case "stacks":
			return withSession({ cmd: "stacks" });

		case "open":
			if (!rest) {
				return { kind: "error", message: "usage: open <snapshot.json> [name]" };
			}
			return withSession({ cmd: "open", args: rest });

		case "enter":
			if (!rest) {
				return { kind: "error", message: "usage: enter <snapshot.json>" };
			}
			return withSession({ cmd: "enter", args: rest });

		case "close":
			return withSession({ cmd: "close" });

		case "history":
			return withSession({ cmd: "history", args: rest || undefined });

		case "ss":
			return { kind: "command", cmd: { cmd: "ss" }, jsonMode };

		case "use":
			if (!rest) {
				return { kind: "error", message: "usage: use <session-name>" };
			}
			return { kind: "command", cmd: { cmd: "use", args: rest }, jsonMode };

		default:
			return { kind: "error", message: `unknown command: ${command}` };
	}
}
