/**
 * Conversation Log
 *
 * Ordered message log for one turn. Messages are frozen when appended;
 * the only mutation is `append`.
 */

import type { Message } from '../types.js';

function freezeMessage(message: Message): Readonly<Message> {
  const copy: Message = { ...message };
  if (message.toolCalls) {
    copy.toolCalls = message.toolCalls.map((call) => Object.freeze({ ...call, arguments: { ...call.arguments } }));
    Object.freeze(copy.toolCalls);
  }
  return Object.freeze(copy);
}

export class ConversationLog {
  private readonly entries: Readonly<Message>[] = [];

  constructor(initial: readonly Message[] = []) {
    for (const message of initial) {
      this.entries.push(freezeMessage(message));
    }
  }

  append(message: Message): Readonly<Message> {
    const frozen = freezeMessage(message);
    this.entries.push(frozen);
    return frozen;
  }

  hasLeadingSystemMessage(): boolean {
    return this.entries[0]?.role === 'system';
  }

  get messages(): readonly Readonly<Message>[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  last(): Readonly<Message> | undefined {
    return this.entries[this.entries.length - 1];
  }

  toArray(): Message[] {
    return [...this.entries];
  }
}
