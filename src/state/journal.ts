/**
 * Append-only, externally observable log.
 *
 * Entries are numbered from 0 and never rewritten. Subscribers get a replay
 * from the requested sequence followed by live entries, in append order.
 */

import { EventEmitter } from "node:events";
import type { Sequenced } from "../types/events.ts";
import { Logger, rootLogger } from "../utils/logger.ts";

export type JournalListener<T> = (record: Sequenced<T>) => void | Promise<void>;

export interface SubscribeOptions {
  fromSequence?: number; // default: replay everything
}

export class Journal<T> {
  private records: Sequenced<T>[] = [];
  private emitter = new EventEmitter();
  private logger: Logger;

  constructor(readonly name: string, logger?: Logger) {
    this.logger = logger ?? rootLogger.child(`Journal:${name}`);
    this.emitter.setMaxListeners(0);
  }

  get length(): number {
    return this.records.length;
  }

  append(entry: T): Sequenced<T> {
    const record: Sequenced<T> = { sequence: this.records.length, entry };
    this.records.push(record);
    this.emitter.emit("entry", record);
    return record;
  }

  entries(fromSequence = 0): Sequenced<T>[] {
    return this.records.slice(Math.max(fromSequence, 0));
  }

  latest(): Sequenced<T> | undefined {
    return this.records[this.records.length - 1];
  }

  /**
   * Observe entries. A failing listener is logged and never affects the append.
   * @returns Unsubscribe function
   */
  subscribe(listener: JournalListener<T>, options: SubscribeOptions = {}): () => void {
    const deliver = (record: Sequenced<T>): void => {
      try {
        const result = listener(record);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error(`Listener failed on entry ${record.sequence}`, error);
          });
        }
      } catch (error) {
        this.logger.error(`Listener failed on entry ${record.sequence}`, error);
      }
    };

    for (const record of this.entries(options.fromSequence ?? 0)) {
      deliver(record);
    }
    this.emitter.on("entry", deliver);
    return () => {
      this.emitter.off("entry", deliver);
    };
  }
}
