import { createSession, type Session } from "./state.js";

/**
 * In-memory, chat-keyed session store.
 * Tasks for the same key run one after another; different keys run concurrently.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly queues = new Map<string, Promise<void>>();

  get(sessionKey: string): Session | undefined {
    return this.sessions.get(sessionKey);
  }

  /** Session for `sessionKey`, created on first use. */
  getOrCreate(sessionKey: string): Session {
    const existing = this.sessions.get(sessionKey);
    if (existing) return existing;
    const session = createSession(sessionKey);
    this.sessions.set(sessionKey, session);
    return session;
  }

  delete(sessionKey: string): void {
    this.sessions.delete(sessionKey);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Run `task` with exclusive access to the session. A failing task rejects
   * its own caller only; the queue moves on to the next task.
   */
  async runExclusive<T>(sessionKey: string, task: (session: Session) => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionKey) ?? Promise.resolve();
    const run = previous.then(() => task(this.getOrCreate(sessionKey)));
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sessionKey, tail);
    try {
      return await run;
    } finally {
      if (this.queues.get(sessionKey) === tail) {
        this.queues.delete(sessionKey);
      }
    }
  }
}
