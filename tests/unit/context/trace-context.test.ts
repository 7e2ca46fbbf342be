import { describe, it, expect } from 'vitest';
import { clearTraceId, getTraceId, runWithTraceId, setTraceId } from '../../../src/context/trace-context.js';

describe('trace context', () => {
    it('should expose the trace id inside runWithTraceId', () => {
        const seen = runWithTraceId('trace-1', () => getTraceId());

        expect(seen).toBe('trace-1');
        expect(getTraceId()).toBeUndefined();
    });

    it('should propagate across awaits', async () => {
        const seen = await runWithTraceId('trace-2', async () => {
            await new Promise((resolve) => setTimeout(resolve, 1));
            return getTraceId();
        });

        expect(seen).toBe('trace-2');
    });

    it('should isolate concurrent contexts', async () => {
        const read = (id: string) =>
            runWithTraceId(id, async () => {
                await Promise.resolve();
                return getTraceId();
            });

        await expect(Promise.all([read('a'), read('b')])).resolves.toEqual(['a', 'b']);
    });

    it('should update and clear the id within a context', () => {
        runWithTraceId('trace-3', () => {
            setTraceId('trace-4');
            expect(getTraceId()).toBe('trace-4');

            clearTraceId();
            expect(getTraceId()).toBeUndefined();
        });
    });
});
