#!/usr/bin/env node
// Interactive frame navigator: loads stack snapshots, then reads one command per line

import * as readline from "node:readline";
import { EventStore } from "@framenav/store";
import type { Command, Response } from "@framenav/types";
import { formatResponse } from "./format.js";
import { Navigator } from "./navigator.js";
import { parseLine } from "./parser.js";

function printUsage(): void {
	const usage = `usage: framenav [snapshot.json...]
       framenav --help

The first snapshot opens a session; each further snapshot is entered as a
nested stack on top of it. Type 'help' at the prompt for commands.`;
	process.stderr.write(`${usage}\n`);
}

const HELP_TEXT = `NAVIGATION
  up [n]                          Go up n frames toward the callers (default 1).
                                  Stops at the outermost frame.
  down [n]                        Go down n frames toward the callee (default 1).
  frame [n]                       Jump to frame n; negative n counts from the end.
                                  Without n, describe the current frame.
  show-stack [-v] [-H [n]] [-T [n]]
                                  List frames: all, the first n (-H) or the
                                  last n (-T); n defaults to 10. -v adds the
                                  receiver and source location.

NESTED STACKS
  enter <snapshot.json>           Push a nested stack on the current session.
  exit                            Leave the active stack for the outer one.
  stacks                          List the nesting history of the session.

SESSIONS
  open <snapshot.json> [name]     Start a session from a snapshot.
  close                           End the current session.
  ss                              List all sessions.
  use <name>                      Switch current session.
  @name <command>                 Target a specific session.

LOG
  history [limit]                 Recent navigation commands of the session.

  Append \\j to a tabular command for JSON output. 'quit' leaves.`;

function printHelp(): void {
	process.stdout.write(`${HELP_TEXT}\n`);
}

function write(cmd: Command, response: Response, jsonMode: boolean): void {
	if (!response.ok) {
		error(response.error);
		return;
	}
	const output = formatResponse(response, jsonMode);
	if (output) {
		process.stdout.write(`${output}\n`);
	}
	if (cmd.cmd === "exit" && response.depth === 0 && !response.priorContext) {
		process.stdout.write("no frame stack left; 'open' another or 'quit'\n");
	}
}

function promptFor(navigator: Navigator): string {
	const session = navigator.currentSession;
	if (!session) return "framenav> ";
	const stack = navigator.stacks.activeStack(session.name);
	return stack
		? `framenav[${session.name}] #${stack.currentIndex()}> `
		: `framenav[${session.name}]> `;
}

// ─── Main ───

function main(): void {
	const rawArgs = process.argv.slice(2);
	if (rawArgs[0] === "--help" || rawArgs[0] === "-h") {
		printUsage();
		printHelp();
		process.exit(0);
	}

	const store = new EventStore();
	const navigator = new Navigator({ store });

	for (const [i, path] of rawArgs.entries()) {
		const cmd: Command =
			i === 0 ? { cmd: "open", args: path } : { cmd: "enter", args: path };
		const response = navigator.dispatch(cmd);
		write(cmd, response, false);
		if (!response.ok) {
			store.close();
			process.exit(1);
		}
	}

	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
		prompt: promptFor(navigator),
	});

	rl.on("line", (line) => {
		const parsed = parseLine(line);
		switch (parsed.kind) {
			case "quit":
				rl.close();
				return;
			case "help":
				printHelp();
				break;
			case "error":
				error(parsed.message);
				break;
			case "command":
				write(parsed.cmd, navigator.dispatch(parsed.cmd), parsed.jsonMode);
				break;
			case "empty":
				break;
		}
		rl.setPrompt(promptFor(navigator));
		rl.prompt();
	});

	rl.on("close", () => {
		navigator.closeAll();
		store.close();
		process.exit(0);
	});

	rl.prompt();
}

function error(msg: string): void {
	process.stderr.write(`error: ${msg}\n`);
}

main();
