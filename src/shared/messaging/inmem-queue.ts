/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages a service enqueued without Redis/BullMQ.
 * - drain() is the test contract: call it after the HTTP request completes
 *   to get all enqueued messages, then assert on (or run) them.
 *
 * RULES:
 * - Implements the Queue interface only; no extra methods are visible to services.
 * - drain() is only used by tests; production code never calls it.
 */

import type { Queue, QueueMessage, QueueMessageOf, QueueMessageType } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    // Copy so later mutation by the caller cannot change what was "sent".
    this.messages.push(structuredClone(message));
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  /** Messages of one type, in enqueue order (queue is left untouched). */
  peek<T extends QueueMessageType>(type: T): QueueMessageOf<T>[] {
    return this.messages.filter((m): m is QueueMessageOf<T> => m.type === type);
  }
}
