import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../mutex.js';

function tick(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('KeyedMutex', () => {
    it('runs sections on one key in arrival order', async () => {
        const mutex = new KeyedMutex();
        const trace: string[] = [];

        await Promise.all([
            mutex.runExclusive('mig-1', async () => {
                trace.push('a:start');
                await tick();
                trace.push('a:end');
            }),
            mutex.runExclusive('mig-1', async () => {
                trace.push('b:start');
                await tick();
                trace.push('b:end');
            }),
        ]);

        expect(trace).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('lets different keys interleave', async () => {
        const mutex = new KeyedMutex();
        const trace: string[] = [];

        await Promise.all([
            mutex.runExclusive('mig-1', async () => {
                trace.push('1:start');
                await tick();
                trace.push('1:end');
            }),
            mutex.runExclusive('mig-2', async () => {
                trace.push('2:start');
                await tick();
                trace.push('2:end');
            }),
        ]);

        expect(trace.slice(0, 2)).toEqual(['1:start', '2:start']);
    });

    it('releases the key when a section throws', async () => {
        const mutex = new KeyedMutex();

        await expect(mutex.runExclusive('mig-1', async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(mutex.runExclusive('mig-1', async () => 42)).resolves.toBe(42);
        expect(mutex.isLocked('mig-1')).toBe(false);
    });

    it('reports a held key', async () => {
        const mutex = new KeyedMutex();
        let release: () => void = () => undefined;
        const held = mutex.runExclusive('mig-1', () => new Promise<void>((resolve) => {
            release = resolve;
        }));

        expect(mutex.isLocked('mig-1')).toBe(true);
        await tick();
        release();
        await held;
        expect(mutex.isLocked('mig-1')).toBe(false);
    });
});
