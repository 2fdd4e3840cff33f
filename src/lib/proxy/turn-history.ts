import type { HistoryMessage } from './types';

/**
 * Rolling conversation log capped at `2 * maxPairs` messages.
 *
 * Trimming never leaves a tool result at the head of the log without the
 * assistant message that issued the call.
 */
export class TurnHistory {
  private messages: HistoryMessage[] = [];

  constructor(private maxPairs = 15) {}

  get maxMessages() {
    return this.maxPairs * 2;
  }

  setMaxPairs(maxPairs: number) {
    this.maxPairs = Math.max(1, Math.floor(maxPairs));
    this.trim();
  }

  append(message: HistoryMessage) {
    this.messages.push(message);
  }

  trim() {
    const max = this.maxMessages;
    if (this.messages.length > max) {
      this.messages = this.messages.slice(-max);
    }
    while (this.messages.length > 0 && this.messages[0].role === 'tool') {
      this.messages.shift();
    }
  }

  list(): readonly HistoryMessage[] {
    return this.messages;
  }

  size() {
    return this.messages.length;
  }

  chars() {
    return this.messages.reduce((sum, message) => sum + message.content.length, 0);
  }

  clear() {
    this.messages = [];
  }
}
