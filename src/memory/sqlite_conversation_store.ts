import * as fs from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";

import { createDefaultLogger, type RelayLogger } from "../lib/log";
import {
  DEFAULT_CONVERSATION_LIMITS,
  retentionCutoff,
  type AppendMessageArgs,
  type Conversation,
  type ConversationLimits,
  type ConversationMessage,
  type ConversationRole,
  type ConversationStore,
  type ConversationSummary,
} from "./conversation_store";

type MessageRow = {
  role: string;
  content: string;
  meta_json: string | null;
  created_at: string;
};

type ConversationRow = {
  cid: string;
  created_at: string;
  last_updated: string;
  message_count: number;
};

const toRole = (value: string): ConversationRole => (value === "assistant" ? "assistant" : "user");

function toMessage(row: MessageRow): ConversationMessage {
  const message: ConversationMessage = {
    role: toRole(row.role),
    content: row.content,
    createdAt: row.created_at,
  };
  if (row.meta_json) {
    const meta: unknown = JSON.parse(row.meta_json);
    if (meta && typeof meta === "object" && !Array.isArray(meta)) {
      message.meta = Object.fromEntries(Object.entries(meta));
    }
  }
  return message;
}

export class SqliteConversationStore implements ConversationStore {
  private db: Database.Database;
  private limits: ConversationLimits;
  private now: () => number;
  private log: RelayLogger;

  constructor(
    dbPath: string = "./data/conversations.db",
    opts: { limits?: Partial<ConversationLimits>; now?: () => number; log?: RelayLogger } = {}
  ) {
    this.limits = { ...DEFAULT_CONVERSATION_LIMITS, ...opts.limits };
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? createDefaultLogger();

    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("busy_timeout = 30000");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
    this.log.info({ dbPath }, "conversation_store.opened");
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        cid TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        last_updated TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        cid TEXT NOT NULL REFERENCES conversations(cid) ON DELETE CASCADE,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        meta_json TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_cid ON messages(cid, id);
    `);
  }

  private cutoff() {
    return retentionCutoff(this.now(), this.limits.retentionDays);
  }

  async appendMessage(cid: string, message: AppendMessageArgs): Promise<boolean> {
    if (!message.content.trim()) {
      this.log.warn({ cid, role: message.role }, "conversation.empty_message_skipped");
      return false;
    }

    const createdAt = new Date(this.now()).toISOString();
    const append = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO conversations (cid, created_at, last_updated) VALUES (?, ?, ?)
           ON CONFLICT(cid) DO UPDATE SET last_updated = excluded.last_updated`
        )
        .run(cid, createdAt, createdAt);

      this.db
        .prepare(`INSERT INTO messages (cid, role, content, meta_json, created_at) VALUES (?, ?, ?, ?, ?)`)
        .run(cid, message.role, message.content, message.meta ? JSON.stringify(message.meta) : null, createdAt);

      this.db.prepare(`DELETE FROM messages WHERE cid = ? AND created_at < ?`).run(cid, this.cutoff());

      this.db
        .prepare(
          `DELETE FROM messages WHERE cid = ? AND id NOT IN (
             SELECT id FROM messages WHERE cid = ? ORDER BY id DESC LIMIT ?
           )`
        )
        .run(cid, cid, this.limits.maxMessages);
    });
    append();
    return true;
  }

  async recentMessages(cid: string, count: number): Promise<ConversationMessage[]> {
    if (count <= 0) return [];
    const rows = this.db
      .prepare(
        `SELECT role, content, meta_json, created_at FROM messages
         WHERE cid = ? AND created_at >= ?
         ORDER BY id DESC LIMIT ?`
      )
      .all(cid, this.cutoff(), count) as MessageRow[];
    return rows.reverse().map(toMessage);
  }

  async getConversation(cid: string): Promise<Conversation | null> {
    const row = this.db
      .prepare(`SELECT cid, created_at, last_updated FROM conversations WHERE cid = ?`)
      .get(cid) as Omit<ConversationRow, "message_count"> | undefined;
    if (!row) return null;

    const messages = await this.recentMessages(cid, this.limits.maxMessages);
    return {
      cid: row.cid,
      messageCount: messages.length,
      createdAt: row.created_at,
      lastUpdated: row.last_updated,
      messages,
    };
  }

  async listConversations(limit = 100): Promise<ConversationSummary[]> {
    const rows = this.db
      .prepare(
        `SELECT c.cid, c.created_at, c.last_updated,
                (SELECT COUNT(*) FROM messages m WHERE m.cid = c.cid AND m.created_at >= ?) AS message_count
         FROM conversations c
         ORDER BY c.last_updated DESC
         LIMIT ?`
      )
      .all(this.cutoff(), limit) as ConversationRow[];
    return rows.map((row) => ({
      cid: row.cid,
      messageCount: row.message_count,
      createdAt: row.created_at,
      lastUpdated: row.last_updated,
    }));
  }

  async deleteConversation(cid: string): Promise<boolean> {
    const info = this.db.prepare(`DELETE FROM conversations WHERE cid = ?`).run(cid);
    if (info.changes > 0) {
      this.log.info({ cid }, "conversation_store.deleted");
    }
    return info.changes > 0;
  }

  async countConversations(): Promise<number> {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM conversations`).get() as { n: number };
    return row.n;
  }

  close() {
    this.db.close();
  }
}
