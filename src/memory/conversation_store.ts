import { createDefaultLogger, type RelayLogger } from "../lib/log";

export type ConversationRole = "user" | "assistant";

export type ConversationMessage = {
  role: ConversationRole;
  content: string;
  createdAt: string;
  meta?: Record<string, unknown>;
};

export type ConversationSummary = {
  cid: string;
  messageCount: number;
  createdAt: string;
  lastUpdated: string;
};

export type Conversation = ConversationSummary & {
  messages: ConversationMessage[];
};

export type AppendMessageArgs = {
  role: ConversationRole;
  content: string;
  meta?: Record<string, unknown>;
};

export type ConversationLimits = {
  maxMessages: number;
  retentionDays: number;
};

export const DEFAULT_CONVERSATION_LIMITS: ConversationLimits = {
  maxMessages: 10,
  retentionDays: 7,
};

/**
 * Per-conversation message history. Keeps the newest `maxMessages` messages
 * and hides (then prunes) anything older than the retention window.
 */
export interface ConversationStore {
  // Returns false when the message was skipped (blank content).
  appendMessage(cid: string, message: AppendMessageArgs): Promise<boolean>;
  // Oldest first.
  recentMessages(cid: string, count: number): Promise<ConversationMessage[]>;
  getConversation(cid: string): Promise<Conversation | null>;
  listConversations(limit?: number): Promise<ConversationSummary[]>;
  deleteConversation(cid: string): Promise<boolean>;
  countConversations(): Promise<number>;
  close(): void;
}

export const retentionCutoff = (nowMs: number, retentionDays: number) =>
  new Date(nowMs - retentionDays * 24 * 60 * 60 * 1000).toISOString();

type StoredConversation = {
  createdAt: string;
  lastUpdated: string;
  messages: ConversationMessage[];
};

export class MemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, StoredConversation>();
  private limits: ConversationLimits;
  private now: () => number;
  private log: RelayLogger;

  constructor(
    opts: { limits?: Partial<ConversationLimits>; now?: () => number; log?: RelayLogger } = {}
  ) {
    this.limits = { ...DEFAULT_CONVERSATION_LIMITS, ...opts.limits };
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? createDefaultLogger();
  }

  private live(conversation: StoredConversation): ConversationMessage[] {
    const cutoff = retentionCutoff(this.now(), this.limits.retentionDays);
    return conversation.messages.filter((message) => message.createdAt >= cutoff);
  }

  async appendMessage(cid: string, message: AppendMessageArgs): Promise<boolean> {
    if (!message.content.trim()) {
      this.log.warn({ cid, role: message.role }, "conversation.empty_message_skipped");
      return false;
    }

    const createdAt = new Date(this.now()).toISOString();
    const existing = this.conversations.get(cid) ?? { createdAt, lastUpdated: createdAt, messages: [] };
    const messages = [
      ...this.live(existing),
      { role: message.role, content: message.content, createdAt, ...(message.meta ? { meta: message.meta } : {}) },
    ].slice(-this.limits.maxMessages);

    this.conversations.set(cid, { createdAt: existing.createdAt, lastUpdated: createdAt, messages });
    return true;
  }

  async recentMessages(cid: string, count: number): Promise<ConversationMessage[]> {
    const conversation = this.conversations.get(cid);
    if (!conversation || count <= 0) return [];
    return this.live(conversation).slice(-count);
  }

  async getConversation(cid: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(cid);
    if (!conversation) return null;
    const messages = this.live(conversation);
    return {
      cid,
      messageCount: messages.length,
      createdAt: conversation.createdAt,
      lastUpdated: conversation.lastUpdated,
      messages,
    };
  }

  async listConversations(limit = 100): Promise<ConversationSummary[]> {
    return Array.from(this.conversations.entries())
      .map(([cid, conversation]) => ({
        cid,
        messageCount: this.live(conversation).length,
        createdAt: conversation.createdAt,
        lastUpdated: conversation.lastUpdated,
      }))
      .sort((a, b) => (a.lastUpdated < b.lastUpdated ? 1 : a.lastUpdated > b.lastUpdated ? -1 : 0))
      .slice(0, limit);
  }

  async deleteConversation(cid: string): Promise<boolean> {
    return this.conversations.delete(cid);
  }

  async countConversations(): Promise<number> {
    return this.conversations.size;
  }

  close() {
    this.conversations.clear();
  }
}
