import { EmptyInputError, LoadError, NotFoundError } from "./errors";
import type { CachedAnswerer } from "./answerer";
import type { CatalogStore, ProductRecord } from "./catalog";
import type { ConversationEntry, Session, SessionStore } from "./state";
import type { AskInput, MatchMode } from "./validators";

export type AskOutcome =
  | { status: "answered"; product: string; entry: ConversationEntry; history: ConversationEntry[] }
  | { status: "empty_input"; message: string }
  | { status: "not_found"; message: string; product: string }
  | { status: "load_error"; message: string }
  | { status: "session_ended"; message: string };

interface AssistantOptions {
  catalog: CatalogStore;
  sessions: SessionStore;
  answerer: CachedAnswerer;
  matchMode: MatchMode;
}

/**
 * Runs one submission: check question, resolve product, answer, log.
 * Submissions for the same session run one after another.
 */
export class ProductAssistant {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly options: AssistantOptions) {}

  ask(session: Session, input: AskInput, requestId?: string): Promise<AskOutcome> {
    const previous = this.queues.get(session.id) ?? Promise.resolve();
    const run = previous.then(() => this.handle(session, input, requestId));
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        if (this.queues.get(session.id) === tail) {
          this.queues.delete(session.id);
        }
      });
    this.queues.set(session.id, tail);
    return run;
  }

  private resolve(input: AskInput): ProductRecord {
    if (!input.question.trim()) {
      throw new EmptyInputError();
    }
    if (!this.options.catalog.current) {
      throw new LoadError("No product catalog is loaded");
    }

    const record = this.options.catalog.resolve(input.product, this.options.matchMode);
    if (!record) {
      throw new NotFoundError(input.product);
    }
    return record;
  }

  private async handle(session: Session, input: AskInput, requestId?: string): Promise<AskOutcome> {
    let record: ProductRecord;
    try {
      record = this.resolve(input);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { status: "not_found", message: error.message, product: error.selection };
      }
      if (error instanceof EmptyInputError) {
        return { status: "empty_input", message: error.message };
      }
      if (error instanceof LoadError) {
        return { status: "load_error", message: error.message };
      }
      throw error;
    }

    const answer = await this.options.answerer.answer(record, input.question, requestId);

    if (!(await this.options.sessions.get(session.id))) {
      return { status: "session_ended", message: "Session ended before the answer was ready" };
    }

    const entry: ConversationEntry = { question: input.question, answer };
    session.log.append(entry);

    return { status: "answered", product: record.Name, entry, history: session.log.entries() };
  }
}
