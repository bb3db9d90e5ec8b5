import { describe, it, expect, vi } from 'vitest';
import { UnitChangeStream } from '../../src/lib/bus/stream';
import { ConnectionError } from '../../src/lib/errors';
import { unitChange } from './fakes';

describe('UnitChangeStream', () => {
    it('hands out buffered events in arrival order', async () => {
        const stream = new UnitChangeStream(async () => undefined);
        const first = unitChange('a.service', { ActiveState: 'active' });
        const second = unitChange('b.service', { ActiveState: 'failed' });
        stream.push(first);
        stream.push(second);

        const iterator = stream[Symbol.asyncIterator]();
        expect(await iterator.next()).toEqual({ value: first, done: false });
        expect(await iterator.next()).toEqual({ value: second, done: false });
    });

    it('wakes a waiting consumer', async () => {
        const stream = new UnitChangeStream(async () => undefined);
        const iterator = stream[Symbol.asyncIterator]();
        const pending = iterator.next();

        const event = unitChange('a.service', { SubState: 'dead' });
        stream.push(event);
        expect(await pending).toEqual({ value: event, done: false });
    });

    it('raises a failure after the events received before it', async () => {
        const stream = new UnitChangeStream(async () => undefined);
        const event = unitChange('a.service', { ActiveState: 'active' });
        stream.push(event);
        stream.fail(new ConnectionError('bus gone'));

        const iterator = stream[Symbol.asyncIterator]();
        expect(await iterator.next()).toEqual({ value: event, done: false });
        await expect(iterator.next()).rejects.toThrow('bus gone');
    });

    it('ends a waiting consumer on close and releases once', async () => {
        const release = vi.fn(async () => undefined);
        const stream = new UnitChangeStream(release);
        const pending = stream[Symbol.asyncIterator]().next();

        await Promise.all([stream.close(), stream.close()]);

        expect(await pending).toEqual({ value: undefined, done: true });
        expect(release).toHaveBeenCalledTimes(1);
        expect(stream.isClosed()).toBe(true);
    });

    it('closes when the consumer breaks out of the loop', async () => {
        const release = vi.fn(async () => undefined);
        const stream = new UnitChangeStream(release);
        stream.push(unitChange('a.service', { ActiveState: 'active' }));

        for await (const event of stream) {
            expect(event.unit).toBe('a.service');
            break;
        }

        expect(release).toHaveBeenCalledTimes(1);
        expect(stream.isClosed()).toBe(true);
    });

    it('drops events pushed after close', async () => {
        const stream = new UnitChangeStream(async () => undefined);
        await stream.close();
        stream.push(unitChange('a.service', { ActiveState: 'active' }));

        expect(await stream[Symbol.asyncIterator]().next()).toEqual({ value: undefined, done: true });
    });
});
