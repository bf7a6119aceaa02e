/**
 * ChatRelay.ts
 * Holds the rolling conversation and forwards it to the completion model.
 *
 *  - send(): user turn in → model call with full history → assistant turn out
 *  - a failed call leaves the history as it was before the message
 *  - history is bounded to the last `historyLimit` turns, trimmed in pairs
 */

import { EventEmitter } from 'events';
import { AppError, InvalidInputError, UpstreamError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { SerialQueue } from '../utils/SerialQueue';
import { metrics } from '../metrics/Metrics';
import { ChatModel, ChatTurn } from './ChatModel';

export interface ChatRelayConfig {
  model: ChatModel;
  /** Even number of turns kept after each exchange. */
  historyLimit?: number;
  /** Longest accepted user message, in characters. */
  maxMessageLength?: number;
}

export interface ChatExchange {
  reply: string;
  history: ChatTurn[];
}

export class ChatRelay extends EventEmitter {
  private turns: ChatTurn[] = [];
  private queue = new SerialQueue();
  private readonly model: ChatModel;
  private readonly historyLimit: number;
  private readonly maxMessageLength: number;

  constructor(config: ChatRelayConfig) {
    super();
    this.model = config.model;
    this.historyLimit = config.historyLimit ?? 20;
    this.maxMessageLength = config.maxMessageLength ?? 8000;
    if (this.historyLimit < 2 || this.historyLimit % 2 !== 0) {
      throw new Error(`historyLimit must be an even number ≥ 2, got ${this.historyLimit}`);
    }
  }

  async send(message: string): Promise<ChatExchange> {
    const content = message.trim();
    if (!content) throw new InvalidInputError('Message must not be empty');
    if (content.length > this.maxMessageLength) {
      throw new InvalidInputError(`Message exceeds ${this.maxMessageLength} characters`);
    }

    return this.queue.run(async () => {
      this.turns.push({ role: 'user', content });
      let reply: string;
      try {
        reply = await this.model.complete(this.history());
      } catch (err) {
        this.turns.pop();
        metrics.incUpstreamError();
        logger.warn(`[Chat] ${this.model.name} failed: ${errorMessage(err)}`);
        throw err instanceof AppError
          ? err
          : new UpstreamError(`Completion request failed: ${errorMessage(err)}`, { cause: err });
      }

      this.turns.push({ role: 'assistant', content: reply });
      this.trim();
      metrics.incChat();
      this.emit('exchange', { message: content, reply });
      return { reply, history: this.history() };
    });
  }

  reset(): Promise<void> {
    return this.queue.run(async () => {
      const dropped = this.turns.length;
      this.turns = [];
      logger.info(`[Chat] History cleared (${dropped} turns)`);
      this.emit('reset');
    });
  }

  history(): ChatTurn[] {
    return this.turns.map((t) => ({ ...t }));
  }

  private trim(): void {
    const excess = this.turns.length - this.historyLimit;
    if (excess <= 0) return;
    // Always drop an even count so the history still opens with a user turn.
    this.turns.splice(0, excess + (excess % 2));
  }
}
