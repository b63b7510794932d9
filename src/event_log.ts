/**
 * Progress Event Log
 *
 * Append-only, per-request record of pipeline progress.
 *
 * GUARANTEES:
 * - Sequence numbers start at 1 and are gapless
 * - A `complete` or `error` event closes its section; further appends to it throw
 * - The terminal event of the `pipeline` section seals the whole log
 * - Subscribers may join late and resume after any sequence number (replay, then live)
 */

import { EventEmitter } from 'events';
import type { EventPhase, ProgressEvent } from './types';

export const PIPELINE_SECTION = 'pipeline';

const TERMINAL_PHASES: ReadonlySet<EventPhase> = new Set<EventPhase>(['complete', 'error']);

export type EventListener = (event: ProgressEvent) => void;

export class EventLogError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EventLogError';
    }
}

export class ProgressEventLog {
    private readonly records: ProgressEvent[] = [];
    private readonly closedSections = new Set<string>();
    private readonly bus = new EventEmitter();
    private sealed = false;

    constructor(private readonly now: () => Date = () => new Date()) {
        // One listener per subscriber; a busy request can have many.
        this.bus.setMaxListeners(0);
    }

    append(
        section: string,
        phase: EventPhase,
        message: string,
        details: Record<string, unknown> = {}
    ): ProgressEvent {
        if (this.sealed) {
            throw new EventLogError(`Event log is sealed; cannot append ${phase} to ${section}`);
        }
        if (this.closedSections.has(section)) {
            throw new EventLogError(`Section ${section} already closed; cannot append ${phase}`);
        }

        const event: ProgressEvent = Object.freeze({
            section,
            phase,
            message,
            details: Object.freeze({ ...details }),
            sequence: this.records.length + 1,
            timestamp: this.now().toISOString(),
        });
        this.records.push(event);

        if (TERMINAL_PHASES.has(phase)) {
            this.closedSections.add(section);
            if (section === PIPELINE_SECTION) this.sealed = true;
        }

        this.bus.emit('event', event);
        return event;
    }

    /** Events with sequence greater than `afterSequence`. */
    since(afterSequence = 0): ProgressEvent[] {
        return this.records.slice(Math.max(0, afterSequence));
    }

    get lastSequence(): number {
        return this.records.length;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    isClosed(section: string): boolean {
        return this.closedSections.has(section);
    }

    /** Terminal `pipeline` event, once the log is sealed. */
    terminal(): ProgressEvent | undefined {
        if (!this.sealed) return undefined;
        return this.records[this.records.length - 1];
    }

    /**
     * Replays everything after `afterSequence`, then delivers live events.
     * Returns an unsubscribe function.
     */
    subscribe(listener: EventListener, afterSequence = 0): () => void {
        // Replay is synchronous, so no live event can interleave with it.
        for (const event of this.since(afterSequence)) listener(event);
        if (this.sealed) return () => undefined;

        this.bus.on('event', listener);
        return () => {
            this.bus.off('event', listener);
        };
    }

    /**
     * Async iteration over events after `afterSequence`, ending with the terminal event.
     */
    async *stream(afterSequence = 0): AsyncGenerator<ProgressEvent, void, undefined> {
        let cursor = afterSequence;
        while (true) {
            const pending = this.since(cursor);
            for (const event of pending) {
                cursor = event.sequence;
                yield event;
            }
            if (this.sealed && cursor >= this.records.length) return;
            await this.waitForNext(cursor);
        }
    }

    private waitForNext(cursor: number): Promise<void> {
        if (this.records.length > cursor) return Promise.resolve();
        return new Promise<void>((resolve) => {
            const onEvent = (): void => {
                this.bus.off('event', onEvent);
                resolve();
            };
            this.bus.on('event', onEvent);
        });
    }
}

/**
 * Frames an event for Server-Sent Events delivery. The `id` field carries the
 * sequence number so a reconnecting client can resume through `Last-Event-ID`.
 */
export function toServerSentEvent(event: ProgressEvent): string {
    const payload = JSON.stringify({
        section: event.section,
        message: event.message,
        details: event.details,
        timestamp: event.timestamp,
    });
    return `id: ${event.sequence}\nevent: ${event.phase}\ndata: ${payload}\n\n`;
}

/** Parses a `Last-Event-ID` header value into a replay cursor. */
export function parseLastEventId(raw: string | undefined | null): number {
    if (!raw) return 0;
    const n = Number(raw.trim());
    return Number.isInteger(n) && n > 0 ? n : 0;
}
