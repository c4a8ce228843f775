export type ConversationRole = "user" | "assistant" | "system";

export type ConversationEntry = {
  role: ConversationRole;
  content: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
};

export type AppendArgs = {
  sessionId: string;
  role: ConversationRole;
  content: string;
  metadata?: Record<string, unknown>;
};

/**
 * Per-session conversation history.
 *
 * Entries are append-only. `append` returns null (and stores nothing) for
 * blank content; `recent` returns the last `k` entries, oldest first.
 */
export interface ConversationStore {
  append(args: AppendArgs): Promise<ConversationEntry | null>;
  recent(sessionId: string, k: number): Promise<ConversationEntry[]>;
  clear(sessionId: string): Promise<void>;
  close(): Promise<void>;
}

export const newEntry = (args: AppendArgs): ConversationEntry => ({
  role: args.role,
  content: args.content,
  timestamp: new Date().toISOString(),
  ...(args.metadata ? { metadata: args.metadata } : {}),
});

export class MemoryConversationStore implements ConversationStore {
  private sessions = new Map<string, ConversationEntry[]>();
  // One process-wide lock: mutations run strictly one after another.
  private tail: Promise<unknown> = Promise.resolve();

  private withLock<T>(fn: () => T): Promise<T> {
    const run = this.tail.then(fn);
    // the caller still sees the rejection through `run`
    this.tail = run.catch(() => undefined);
    return run;
  }

  async append(args: AppendArgs): Promise<ConversationEntry | null> {
    if (!args.content.trim()) return null;

    return this.withLock(() => {
      const entry = newEntry(args);
      const entries = this.sessions.get(args.sessionId) ?? [];
      entries.push(entry);
      this.sessions.set(args.sessionId, entries);
      return entry;
    });
  }

  async recent(sessionId: string, k: number): Promise<ConversationEntry[]> {
    if (k <= 0) return [];
    const entries = this.sessions.get(sessionId) ?? [];
    return entries.slice(-k).map((entry) => ({ ...entry }));
  }

  async clear(sessionId: string): Promise<void> {
    await this.withLock(() => {
      this.sessions.delete(sessionId);
    });
  }

  async close(): Promise<void> {
    await this.withLock(() => {
      this.sessions.clear();
    });
  }
}
