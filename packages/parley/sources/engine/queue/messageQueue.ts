import { getLogger } from "../../log.js";
import type { Message, MessagePredicate } from "../messages/messageTypes.js";

const logger = getLogger("engine.queue");

export type MessageQueuePutOptions = {
    /** Places the message ahead of everything already buffered. */
    priority?: boolean;
};

export type MessageQueueBatchOptions = {
    predicate?: MessagePredicate | null;
    /** Upper bound on the wait; Infinity waits until enough messages arrive or the queue closes. */
    timeoutMs: number;
    minItems?: number;
    maxItems?: number;
};

type MessageQueueWaiter = () => void;

const matchAll: MessagePredicate = () => true;

/**
 * Per-participant inbox. Consumers block on a condition signalled by put and close,
 * never by polling. A put that lands between a count and a wait still wakes the waiter
 * because both run on the same turn of the event loop.
 */
export class MessageQueue {
    readonly ownerKey: string;
    private items: Message[] = [];
    private waiters = new Set<MessageQueueWaiter>();
    private closed = false;

    constructor(ownerKey: string) {
        this.ownerKey = ownerKey;
    }

    put(message: Message, options: MessageQueuePutOptions = {}): void {
        if (this.closed) {
            throw new Error(`Queue ${this.ownerKey} is closed`);
        }
        if (options.priority) {
            this.items.unshift(message);
        } else {
            this.items.push(message);
        }
        logger.debug(
            { ownerKey: this.ownerKey, messageId: message.id, size: this.items.length },
            "event: Message queued"
        );
        this.notify();
    }

    /**
     * Waits until at least minItems matching messages are buffered, then takes up to maxItems of them.
     * Returns whatever matches (possibly nothing) once the timeout passes or the queue closes.
     */
    async getBatch(options: MessageQueueBatchOptions): Promise<Message[]> {
        const predicate = options.predicate ?? matchAll;
        const minItems = Math.max(1, options.minItems ?? 1);
        const deadline = Date.now() + Math.max(0, options.timeoutMs);

        while (true) {
            const count = this.count(predicate);
            const remaining = deadline - Date.now();
            if (count >= minItems || this.closed || remaining <= 0) {
                return this.take(predicate, options.maxItems);
            }
            await this.waitForChange(remaining);
        }
    }

    /**
     * Resolves true as soon as a matching message is buffered, false on timeout or close.
     * Nothing is removed from the queue.
     */
    async waitFor(predicate: MessagePredicate, timeoutMs: number): Promise<boolean> {
        const deadline = Date.now() + Math.max(0, timeoutMs);
        while (true) {
            if (this.items.some(predicate)) {
                return true;
            }
            const remaining = deadline - Date.now();
            if (this.closed || remaining <= 0) {
                return false;
            }
            await this.waitForChange(remaining);
        }
    }

    /**
     * Resolves true on the next put or close, false when timeoutMs elapses first.
     */
    waitForChange(timeoutMs: number): Promise<boolean> {
        if (this.closed) {
            return Promise.resolve(true);
        }
        return new Promise<boolean>((resolve) => {
            let timer: ReturnType<typeof setTimeout> | null = null;
            const waiter: MessageQueueWaiter = () => {
                if (timer) {
                    clearTimeout(timer);
                }
                resolve(true);
            };
            this.waiters.add(waiter);
            if (Number.isFinite(timeoutMs)) {
                timer = setTimeout(
                    () => {
                        this.waiters.delete(waiter);
                        resolve(false);
                    },
                    Math.max(0, timeoutMs)
                );
            }
        });
    }

    peek(predicate: MessagePredicate = matchAll): Message[] {
        return this.items.filter(predicate);
    }

    take(predicate: MessagePredicate = matchAll, maxItems?: number): Message[] {
        const limit = maxItems === undefined ? Number.POSITIVE_INFINITY : Math.max(0, maxItems);
        const taken: Message[] = [];
        const kept: Message[] = [];
        for (const item of this.items) {
            if (taken.length < limit && predicate(item)) {
                taken.push(item);
            } else {
                kept.push(item);
            }
        }
        this.items = kept;
        return taken;
    }

    remove(messageId: string): boolean {
        const before = this.items.length;
        this.items = this.items.filter((item) => item.id !== messageId);
        return this.items.length !== before;
    }

    clear(): number {
        const count = this.items.length;
        this.items = [];
        return count;
    }

    /**
     * Stops accepting messages and wakes every waiter. Buffered messages stay readable.
     */
    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.notify();
    }

    snapshot(): readonly Message[] {
        return Object.freeze([...this.items]);
    }

    size(): number {
        return this.items.length;
    }

    isClosed(): boolean {
        return this.closed;
    }

    private count(predicate: MessagePredicate): number {
        let count = 0;
        for (const item of this.items) {
            if (predicate(item)) {
                count += 1;
            }
        }
        return count;
    }

    private notify(): void {
        const waiters = [...this.waiters];
        this.waiters.clear();
        for (const waiter of waiters) {
            waiter();
        }
    }
}
