import { logger } from "../logger.js";
import type { NewCallRecord } from "../types/supervised-call.types.js";
import type { CallRecordStore } from "./task-store.js";



/** Where supervised calls report each attempt. Recording never blocks the call. */
export interface CallAuditSink {
    record(record: NewCallRecord): void;
}

/**
 * Buffers call records in memory and writes them to the store in batches.
 * The monitor flushes on every cycle and the scheduler flushes once more on stop.
 */
export class CallAuditLog implements CallAuditSink {
    private buffer: NewCallRecord[] = [];

    constructor(private store: CallRecordStore) { }

    record(record: NewCallRecord): void {
        this.buffer.push(record);
    }

    get pending(): number {
        return this.buffer.length;
    }

    /**
     * Writes everything buffered so far. On a store failure the batch goes back
     * to the front of the buffer and the error propagates.
     * @returns the number of records written.
     */
    async flush(): Promise<number> {
        if (this.buffer.length === 0) return 0;

        const batch = this.buffer.splice(0);
        try {
            await this.store.append(batch);
        } catch (error) {
            this.buffer.unshift(...batch);
            logger.error({ error, records: batch.length }, "Failed to flush call audit log");
            throw error;
        }
        logger.debug({ records: batch.length }, "Flushed call audit log");
        return batch.length;
    }
}
