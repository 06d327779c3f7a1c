/**
 * Bondline: Event Log
 *
 * Append-only record of everything the exchange emits. Events written
 * inside a call frame that later reverts are dropped with it; listeners
 * only ever see events from frames that committed.
 */

import type { ExchangeEvent, ExchangeEventType } from './types.js';
import type { Journaled } from './runtime.js';

export type EventListener = (event: ExchangeEvent) => void;

export class EventLog implements Journaled<number> {
    private records: ExchangeEvent[] = [];
    private published = 0;
    private listeners: Set<EventListener> = new Set();

    emit(event: ExchangeEvent): void {
        this.records.push(event);
    }

    /** Deliver everything recorded since the last publish */
    publish(): void {
        while (this.published < this.records.length) {
            const event = this.records[this.published];
            this.published++;
            for (const listener of this.listeners) {
                listener(event);
            }
        }
    }

    /** @returns unsubscribe function */
    subscribe(listener: EventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    all(): ExchangeEvent[] {
        return [...this.records];
    }

    ofType<T extends ExchangeEventType>(type: T): Extract<ExchangeEvent, { type: T }>[] {
        return this.records.filter(
            (event): event is Extract<ExchangeEvent, { type: T }> => event.type === type,
        );
    }

    last<T extends ExchangeEventType>(type: T): Extract<ExchangeEvent, { type: T }> | undefined {
        const matches = this.ofType(type);
        return matches[matches.length - 1];
    }

    snapshot(): number {
        return this.records.length;
    }

    restore(length: number): void {
        this.records.length = Math.max(length, this.published);
    }
}
