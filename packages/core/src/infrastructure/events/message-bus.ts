/**
 * @file packages/core/src/infrastructure/events/message-bus.ts
 * @description In-memory publish/subscribe bus shared by the orchestrator and its specialists.
 */

import { singleton } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import {
  CHANNELS,
  ChannelSchema,
  type BusMessage,
  type Channel,
  type MessagePayload,
  type OutgoingMessage,
} from '@taskforce/shared';
import { UnknownChannelError } from '../../domain/errors/app-error.js';
import { AsyncQueue } from './async-queue.js';

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Narrows an untrusted string to the channel vocabulary.
 */
export function parseChannel(value: string): Channel {
  const result = ChannelSchema.safeParse(value);
  if (!result.success) {
    throw new UnknownChannelError(value);
  }
  return result.data;
}

export interface SubscribeOptions {
  /** Ends the subscription and releases its queue when aborted. */
  signal?: AbortSignal;
}

/**
 * A live, infinite sequence of messages for one channel. The queue is registered
 * when the subscription is created and released when iteration stops: `break`,
 * a thrown error in a `for await` body, `return()`, `close()` or an aborted signal.
 */
export class Subscription implements AsyncIterableIterator<BusMessage> {
  private released = false;

  constructor(
    readonly channel: Channel,
    private readonly queue: AsyncQueue<BusMessage>,
    private readonly release: () => void,
    private readonly signal?: AbortSignal,
  ) {
    if (signal?.aborted) {
      this.close();
    } else {
      signal?.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  get active(): boolean {
    return !this.released;
  }

  async next(): Promise<IteratorResult<BusMessage, undefined>> {
    if (this.released) return DONE;
    const result = await this.queue.next(this.signal);
    if (result.done) {
      this.close();
    }
    return result;
  }

  async return(): Promise<IteratorResult<BusMessage, undefined>> {
    this.close();
    return DONE;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  close(): void {
    if (this.released) return;
    this.released = true;
    this.signal?.removeEventListener('abort', this.onAbort);
    this.release();
    this.queue.close();
  }

  private readonly onAbort = (): void => {
    this.close();
  };
}

@singleton()
export class MessageBus {
  private subscribers = new Map<Channel, Set<AsyncQueue<BusMessage>>>(
    CHANNELS.map((channel) => [channel, new Set()]),
  );

  /**
   * Publishes a message to every queue currently registered for its channel.
   * The payload is cloned and the stamped message frozen, so every subscriber sees the
   * same immutable snapshot. Queues are unbounded; this never waits on a consumer.
   */
  async publish<P extends MessagePayload>(message: OutgoingMessage<P>): Promise<BusMessage<P>> {
    const channel = parseChannel(message.channel);
    const stamped: BusMessage<P> = Object.freeze({
      id: uuidv4(),
      channel,
      sender: message.sender,
      payload: Object.freeze(structuredClone(message.payload)),
      timestamp: Date.now(),
    });

    // Copy first: a subscriber released mid-delivery must not disturb iteration.
    for (const queue of [...this.queuesFor(channel)]) {
      queue.push(stamped);
    }
    return stamped;
  }

  /**
   * Registers a new queue for `channel`. Messages published before this call are never
   * delivered to it.
   */
  subscribe(channel: Channel, options: SubscribeOptions = {}): Subscription {
    const queues = this.queuesFor(parseChannel(channel));
    const queue = new AsyncQueue<BusMessage>();
    queues.add(queue);
    return new Subscription(channel, queue, () => queues.delete(queue), options.signal);
  }

  /**
   * Buffered, undelivered messages across every subscriber of `channel`. Non-destructive.
   */
  snapshot(channel: Channel): BusMessage[] {
    return [...this.queuesFor(channel)].flatMap((queue) => [...queue.peek()]);
  }

  subscriberCount(channel: Channel): number {
    return this.queuesFor(channel).size;
  }

  private queuesFor(channel: Channel): Set<AsyncQueue<BusMessage>> {
    let queues = this.subscribers.get(channel);
    if (!queues) {
      queues = new Set();
      this.subscribers.set(channel, queues);
    }
    return queues;
  }
}
