import Database from "better-sqlite3";
import { EVENTS_DB_PATH } from "@framenav/types";

export interface EventRecord {
	ts?: number;
	source: string;
	category: string;
	method: string;
	data?: unknown;
	sessionId?: string | null;
}

type InsertParams = [number, string, string, string, string, string | null];

interface PendingEvent {
	ts: number;
	source: string;
	category: string;
	method: string;
	data: string;
	sessionId: string | null;
}

export class EventStore {
	private db: Database.Database;
	private insertStmt: Database.Statement<InsertParams>;
	private pending: PendingEvent[] = [];
	private flushTimer: NodeJS.Timeout;
	private closed = false;
	private flushError: Error | null = null;

	constructor(dbPath = EVENTS_DB_PATH) {
		this.db = new Database(dbPath);
		this.db.pragma("journal_mode = WAL");
		this.db.pragma("synchronous = NORMAL");
		this.db.pragma("user_version = 1");
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS events (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				ts INTEGER NOT NULL,
				source TEXT NOT NULL,
				category TEXT NOT NULL,
				method TEXT NOT NULL,
				data TEXT NOT NULL,
				session_id TEXT
			)
		`);
		this.db.exec("CREATE INDEX IF NOT EXISTS idx_events_ts ON events(ts)");
		this.db.exec(
			"CREATE INDEX IF NOT EXISTS idx_events_category ON events(category)",
		);
		this.db.exec(
			"CREATE INDEX IF NOT EXISTS idx_events_session_id ON events(session_id)",
		);

		this.insertStmt = this.db.prepare<InsertParams>(
			"INSERT INTO events (ts, source, category, method, data, session_id) VALUES (?, ?, ?, ?, ?, ?)",
		);

		this.flushTimer = setInterval(() => {
			this.flush();
		}, 100);
		if (this.flushTimer.unref) this.flushTimer.unref();
	}

	record(event: EventRecord, flushNow = false): void {
		if (this.closed) return;
		this.pending.push({
			ts: event.ts ?? Date.now(),
			source: event.source,
			category: event.category,
			method: event.method,
			data: safeJsonStringify(event.data),
			sessionId: event.sessionId ?? null,
		});
		if (flushNow) {
			this.flush();
		}
	}

	flush(): void {
		if (this.closed || this.pending.length === 0) return;

		const batch = this.pending;
		this.pending = [];

		const insertAll = this.db.transaction((events: PendingEvent[]) => {
			for (const event of events) {
				this.insertStmt.run(
					event.ts,
					event.source,
					event.category,
					event.method,
					event.data,
					event.sessionId,
				);
			}
		});

		try {
			insertAll(batch);
			this.flushError = null;
		} catch (error) {
			// the transaction rolled back; retry the batch on the next flush
			this.flushError =
				error instanceof Error ? error : new Error(String(error));
			this.pending = [...batch, ...this.pending];
		}
	}

	/** Error from the most recent failed flush, cleared by the next successful one. */
	get lastFlushError(): Error | null {
		return this.flushError;
	}

	query(sql: string, params: unknown[] = []): Record<string, unknown>[] {
		if (this.closed) return [];
		this.flush();
		const stmt = this.db.prepare<unknown[], Record<string, unknown>>(sql);
		return stmt.all(...params);
	}

	close(): void {
		if (this.closed) return;
		clearInterval(this.flushTimer);
		this.flush();
		this.db.close();
		this.closed = true;
	}
}

function safeJsonStringify(value: unknown): string {
	if (value === undefined) return "null";
	try {
		return JSON.stringify(value);
	} catch {
		return JSON.stringify({ error: "unserializable" });
	}
}
