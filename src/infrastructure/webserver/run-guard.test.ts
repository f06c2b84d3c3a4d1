// src/infrastructure/webserver/run-guard.test.ts
import { RunAbortedError } from '../../core/common/errors';
import { ClosableResponse, RunGuard } from './run-guard';

class FakeResponse implements ClosableResponse {
    writableFinished = false;
    private listeners: Array<() => void> = [];

    once(event: 'close', listener: () => void): this {
        this.listeners.push(listener);
        return this;
    }

    close(): void {
        this.listeners.forEach(listener => listener());
    }
}

describe('RunGuard', () => {
    let now: number;
    let response: FakeResponse;
    let guard: RunGuard;

    beforeEach(() => {
        now = 1_000;
        response = new FakeResponse();
        guard = new RunGuard(response, 500, () => now);
    });

    it('lets a run inside its deadline continue', () => {
        now = 1_500;
        expect(() => guard.check()).not.toThrow();
        expect(guard.elapsedMs).toBe(500);
    });

    it('aborts a run past its deadline', () => {
        now = 1_501;
        expect(() => guard.check()).toThrow(RunAbortedError);
        expect(() => guard.check()).toThrow('Report run exceeded its 500 ms deadline');
    });

    it('aborts once the client disconnects', () => {
        response.close();
        expect(() => guard.check()).toThrow('Client disconnected before the report was written');
    });

    it('ignores the close that follows a finished response', () => {
        response.writableFinished = true;
        response.close();
        expect(() => guard.check()).not.toThrow();
    });
});
