/**
 * EventChannel - an unbuffered, single-direction event channel
 *
 * A send does not complete until a consumer has received the value, so a
 * producer can never get ahead of the client observing its events.
 */

import { ChannelClosedError } from './errors.js';

/**
 * Receive-only side of a channel, as handed to consumers
 */
export interface EventSource<T> extends AsyncIterable<T> {
  receive(): Promise<IteratorResult<T, undefined>>;
  readonly closed: boolean;
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * @example
 * ```typescript
 * const events = new EventChannel<SessionEvent>();
 *
 * // consumer
 * for await (const event of events) handle(event);
 *
 * // producer: resolves once the consumer took the event
 * await events.send(connectedEvent());
 * events.close();
 * ```
 */
export class EventChannel<T> implements EventSource<T> {
  private _closed = false;
  private _senders: PendingSend<T>[] = [];
  private _receivers: PendingReceive<T>[] = [];

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Deliver a value, resolving once a consumer has received it
   */
  send(value: T): Promise<void> {
    if (this._closed) {
      return Promise.reject(new ChannelClosedError('send on closed channel'));
    }

    const receiver = this._receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this._senders.push({ value, resolve, reject });
    });
  }

  /**
   * Take the next value, or `done` once the channel is closed and drained
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this._senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ done: false, value: sender.value });
    }

    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise(resolve => {
      this._receivers.push(resolve);
    });
  }

  /**
   * Close the channel. Waiting consumers see `done`; blocked senders are rejected.
   */
  close(): void {
    if (this._closed) {
      throw new ChannelClosedError('close of closed channel');
    }
    this._closed = true;

    for (const receiver of this._receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
    for (const sender of this._senders.splice(0)) {
      sender.reject(new ChannelClosedError('channel closed before the value was received'));
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.receive();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  }
}
