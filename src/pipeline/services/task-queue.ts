import type { TaskDescriptor } from "../../shared/types/task.types.js";



interface Waiter {
    resolve(descriptor: TaskDescriptor | null): void;
}

/**
 * In-process FIFO of runnable tasks. Holds descriptors only; the store stays
 * authoritative, so losing the queue (restart, `clear`) loses no task.
 *
 * A descriptor is delivered to exactly one `dequeue` caller. A task id is queued
 * at most once at a time.
 */
export class TaskQueue {
    private items: TaskDescriptor[] = [];
    private waiters: Waiter[] = [];

    /** @returns false when the task is already queued. */
    enqueue(descriptor: TaskDescriptor): boolean {
        if (this.has(descriptor.taskId)) return false;

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve(descriptor);
        } else {
            this.items.push(descriptor);
        }
        return true;
    }

    /**
     * Takes the oldest descriptor, waiting up to `timeoutMs` for one to arrive.
     * Resolves `null` on timeout or when `signal` aborts.
     */
    dequeue(timeoutMs: number, signal?: AbortSignal): Promise<TaskDescriptor | null> {
        const next = this.items.shift();
        if (next) return Promise.resolve(next);
        if (signal?.aborted || timeoutMs <= 0) return Promise.resolve(null);

        return new Promise(resolve => {
            const settle = (descriptor: TaskDescriptor | null) => {
                clearTimeout(timer);
                signal?.removeEventListener("abort", onAbort);
                resolve(descriptor);
            };
            const waiter: Waiter = { resolve: settle };
            const leave = () => {
                const index = this.waiters.indexOf(waiter);
                if (index !== -1) this.waiters.splice(index, 1);
                settle(null);
            };
            const onAbort = () => leave();
            const timer = setTimeout(leave, timeoutMs);

            signal?.addEventListener("abort", onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    remove(taskId: string): boolean {
        const index = this.items.findIndex(item => item.taskId === taskId);
        if (index === -1) return false;
        this.items.splice(index, 1);
        return true;
    }

    has(taskId: string): boolean {
        return this.items.some(item => item.taskId === taskId);
    }

    size(): number {
        return this.items.length;
    }

    /** Drops queued descriptors. Blocked consumers keep waiting. */
    clear(): void {
        this.items = [];
    }
}
