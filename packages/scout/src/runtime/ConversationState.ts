import type { ProviderMessage } from "../providers/ProviderTypes.js";

export const MAX_CONVERSATION_TURNS = 5;

/** Per-invocation conversation: append-only history, turn counter and context buffer. */
export class ConversationState {
  private history: ProviderMessage[] = [];
  private turns = 0;
  private buffer = "";

  constructor(private readonly maxTurns: number = MAX_CONVERSATION_TURNS) {
    if (maxTurns < 1 || maxTurns > MAX_CONVERSATION_TURNS) {
      throw new Error(`maxTurns must be between 1 and ${MAX_CONVERSATION_TURNS}`);
    }
  }

  get iterationCount(): number {
    return this.turns;
  }

  get contextBuffer(): string {
    return this.buffer;
  }

  get messages(): readonly ProviderMessage[] {
    return this.history;
  }

  snapshot(): ProviderMessage[] {
    return this.history.map((message) => ({ ...message }));
  }

  hasTurnsLeft(): boolean {
    return this.turns < this.maxTurns;
  }

  beginTurn(): number {
    if (!this.hasTurnsLeft()) {
      throw new Error(`Turn limit of ${this.maxTurns} reached`);
    }
    this.turns += 1;
    return this.turns;
  }

  appendMessage(message: ProviderMessage): void {
    this.history.push(Object.freeze({ ...message }));
  }

  appendContext(text: string): void {
    this.buffer += text;
  }
}
