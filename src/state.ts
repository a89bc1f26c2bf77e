import crypto from "node:crypto";

export interface ConversationEntry {
  question: string;
  answer: string;
}

export const DEFAULT_HISTORY_LIMIT = 5;

/** Newest entry last; once over the limit the oldest entries are dropped. */
export class ConversationLog {
  private readonly items: ConversationEntry[] = [];

  constructor(readonly limit: number = DEFAULT_HISTORY_LIMIT) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`History limit must be a positive integer, got ${limit}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  append(entry: ConversationEntry): void {
    this.items.push({ question: entry.question, answer: entry.answer });
    while (this.items.length > this.limit) {
      this.items.shift();
    }
  }

  entries(): ConversationEntry[] {
    return this.items.map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.items.length = 0;
  }
}

export interface Session {
  readonly id: string;
  readonly createdAt: string;
  readonly log: ConversationLog;
}

export interface SessionStore {
  create(): Promise<Session>;
  get(id: string): Promise<Session | undefined>;
  delete(id: string): Promise<boolean>;
}

export class InMemorySessionStore implements SessionStore {
  private readonly map = new Map<string, Session>();

  constructor(private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT) {}

  async create(): Promise<Session> {
    const session: Session = {
      id: crypto.randomUUID(),
      createdAt: new Date().toISOString(),
      log: new ConversationLog(this.historyLimit),
    };
    this.map.set(session.id, session);
    return session;
  }

  async get(id: string): Promise<Session | undefined> {
    return this.map.get(id);
  }

  async delete(id: string): Promise<boolean> {
    const session = this.map.get(id);
    session?.log.clear();
    return this.map.delete(id);
  }
}
