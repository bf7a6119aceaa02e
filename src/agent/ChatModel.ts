import { UpstreamError } from '../utils/errors';

export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

/** A completion endpoint: given the whole conversation, produce the next assistant text. */
export interface ChatModel {
  readonly name: string;
  complete(history: ChatTurn[]): Promise<string>;
}

/** Used when no project is configured; every call fails the same way. */
export class DisabledChatModel implements ChatModel {
  readonly name = 'disabled';

  constructor(private readonly reason: string) {}

  async complete(): Promise<string> {
    throw new UpstreamError(`Chat model is not available: ${this.reason}`);
  }
}
