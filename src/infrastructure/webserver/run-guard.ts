// src/infrastructure/webserver/run-guard.ts
import { RunAbortedError } from '../../core/common/errors';

/** The slice of an HTTP response the guard listens on. */
export interface ClosableResponse {
    once(event: 'close', listener: () => void): unknown;
    readonly writableFinished: boolean;
}

/**
 * Tracks whether a report run is still wanted: the client may hang up,
 * or the run may outlive its deadline. Checked between pipeline stages.
 */
export class RunGuard {
    private readonly startedAt: number;
    private disconnected = false;

    constructor(
        response: ClosableResponse,
        private readonly timeoutMs: number,
        private readonly now: () => number = Date.now
    ) {
        this.startedAt = this.now();
        response.once('close', () => {
            // 'close' also fires after a normal finish
            if (!response.writableFinished) this.disconnected = true;
        });
    }

    get elapsedMs(): number {
        return this.now() - this.startedAt;
    }

    /** @throws {RunAbortedError} once the client is gone or the deadline has passed */
    check(): void {
        if (this.disconnected) {
            throw new RunAbortedError('Client disconnected before the report was written');
        }
        if (this.elapsedMs > this.timeoutMs) {
            throw new RunAbortedError(`Report run exceeded its ${this.timeoutMs} ms deadline`);
        }
    }
}
