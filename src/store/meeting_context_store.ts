import type { MeetingContext } from "../contracts/chat";

/** Latest meeting context per session; replaced whole, never merged. */
export class MeetingContextStore {
  private contexts = new Map<string, MeetingContext>();

  get(sessionId: string): MeetingContext | undefined {
    return this.contexts.get(sessionId);
  }

  set(sessionId: string, context: MeetingContext): void {
    this.contexts.set(sessionId, context);
  }

  remove(sessionId: string): void {
    this.contexts.delete(sessionId);
  }

  clearAll(): void {
    this.contexts.clear();
  }
}
