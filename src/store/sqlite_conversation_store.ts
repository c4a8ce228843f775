import * as fs from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import {
  newEntry,
  type AppendArgs,
  type ConversationEntry,
  type ConversationRole,
  type ConversationStore,
} from "./conversation_store";

type EntryRow = {
  role: string;
  content: string;
  timestamp: string;
  metadata_json: string | null;
};

const ROLES: readonly ConversationRole[] = ["user", "assistant", "system"];

const MetadataJson = z.record(z.string(), z.unknown());

const toRole = (value: string): ConversationRole =>
  ROLES.find((role) => role === value) ?? "system";

export class SqliteConversationStore implements ConversationStore {
  private db: Database.Database;

  constructor(dbPath: string = "./data/conversations.db") {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        metadata_json TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_conversation_entries_session
        ON conversation_entries (session_id, id);
    `);
  }

  async append(args: AppendArgs): Promise<ConversationEntry | null> {
    if (!args.content.trim()) return null;

    const entry = newEntry(args);
    this.db
      .prepare(`
        INSERT INTO conversation_entries (session_id, role, content, timestamp, metadata_json)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(
        args.sessionId,
        entry.role,
        entry.content,
        entry.timestamp,
        entry.metadata ? JSON.stringify(entry.metadata) : null
      );
    return entry;
  }

  async recent(sessionId: string, k: number): Promise<ConversationEntry[]> {
    if (k <= 0) return [];

    const rows = this.db
      .prepare<[string, number], EntryRow>(`
        SELECT role, content, timestamp, metadata_json FROM (
          SELECT id, role, content, timestamp, metadata_json
          FROM conversation_entries
          WHERE session_id = ?
          ORDER BY id DESC
          LIMIT ?
        ) ORDER BY id ASC
      `)
      .all(sessionId, k);

    return rows.map((row) => {
      const metadata = row.metadata_json
        ? MetadataJson.safeParse(JSON.parse(row.metadata_json))
        : undefined;
      return {
        role: toRole(row.role),
        content: row.content,
        timestamp: row.timestamp,
        ...(metadata?.success ? { metadata: metadata.data } : {}),
      };
    });
  }

  async clear(sessionId: string): Promise<void> {
    this.db.prepare("DELETE FROM conversation_entries WHERE session_id = ?").run(sessionId);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
