import { v4 as uuidv4 } from 'uuid';
import type { ChatMessage } from '../types';

/**
 * In-memory conversation history, one bounded list per session.
 *
 * Sessions live only as long as the process: the map starts empty and
 * nothing is written anywhere. A restart forgets every conversation.
 */
export class SessionManager {
  private readonly sessions = new Map<string, ChatMessage[]>();
  private readonly queues = new Map<string, Promise<unknown>>();

  constructor(private readonly maxHistory = 2) {}

  createSession(): string {
    const sessionId = uuidv4();
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  addMessage(sessionId: string, role: ChatMessage['role'], content: string): void {
    const messages = this.sessions.get(sessionId) ?? [];
    messages.push({ role, content });
    // Keep the most recent maxHistory exchanges.
    const limit = this.maxHistory * 2;
    this.sessions.set(sessionId, messages.length > limit ? messages.slice(-limit) : messages);
  }

  addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
    this.addMessage(sessionId, 'user', userMessage);
    this.addMessage(sessionId, 'assistant', assistantMessage);
  }

  getMessages(sessionId: string): ChatMessage[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  /** History as prompt text, or undefined for unknown and empty sessions. */
  getConversationHistory(sessionId: string): string | undefined {
    const messages = this.sessions.get(sessionId);
    if (!messages || messages.length === 0) return undefined;
    return messages
      .map(m => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
      .join('\n');
  }

  /** The session's task queue is left to drain and clears itself once idle. */
  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Run `task` after every earlier task for the same session has settled.
   * Different sessions never wait on each other.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const tail = run.catch(() => undefined);
    this.queues.set(sessionId, tail);
    void tail.then(() => {
      if (this.queues.get(sessionId) === tail) this.queues.delete(sessionId);
    });
    return run;
  }
}
