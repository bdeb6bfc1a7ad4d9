import { EventEmitter } from "node:events";
import type { ChannelMessage, ChannelAccountSnapshot } from "./types.js";

export type AdapterEvents = {
  message: [msg: ChannelMessage];
  connected: [snapshot: ChannelAccountSnapshot];
  disconnected: [snapshot: ChannelAccountSnapshot, reason?: string];
  error: [error: Error, context?: string];
  status: [snapshot: ChannelAccountSnapshot];
};

type EventMap = { [event: string]: unknown[] };

/** EventEmitter whose event names and listener arguments are checked against `Events`. */
export class TypedEventEmitter<Events extends EventMap = AdapterEvents> extends EventEmitter {
  override emit<K extends keyof Events & string>(event: K, ...args: Events[K]): boolean {
    return super.emit(event, ...args);
  }

  override on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  override once<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  override off<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }
}
