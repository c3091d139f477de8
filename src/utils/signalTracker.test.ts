import {describe, expect, it, vi} from 'vitest';
import {Settings} from '../settings.js';
import {SignalTracker} from './signalTracker.js';
import type {Connectable} from './signalEmitter.js';

describe('SignalTracker', () => {
    it('tracks connections made through an emitter', () => {
        const settings = new Settings();
        const tracker = new SignalTracker('Test');

        settings.connect('changed', vi.fn(), tracker);
        settings.connect('changed::hover-delay', vi.fn(), tracker);

        expect(tracker.count).toBe(2);
        expect(tracker.hasConnections()).toBe(true);
        expect(settings.connectionCount).toBe(2);
    });

    it('disconnects everything on disconnectAll', () => {
        const settings = new Settings();
        const tracker = new SignalTracker('Test');
        const handler = vi.fn();
        settings.connect('changed', handler, tracker);

        tracker.disconnectAll();
        settings.set('hover-delay', 400);

        expect(handler).not.toHaveBeenCalled();
        expect(tracker.count).toBe(0);
        expect(settings.connectionCount).toBe(0);
    });

    it('disconnects a single signal by id', () => {
        const settings = new Settings();
        const tracker = new SignalTracker('Test');
        const id = settings.connect('changed', vi.fn(), tracker);

        expect(tracker.disconnect(id)).toBe(true);
        expect(tracker.disconnect(id)).toBe(false);
        expect(settings.connectionCount).toBe(0);
    });

    it('disconnects in reverse order and continues past failures', () => {
        const order: number[] = [];
        const object: Connectable = {
            disconnect(id: number) {
                order.push(id);
                if (id === 2) {
                    throw new Error('already gone');
                }
            },
        };
        const tracker = new SignalTracker('Test');
        tracker.track(object, 1, 'first');
        tracker.track(object, 2, 'second');
        tracker.track(object, 3, 'third');

        tracker.disconnectAll();

        expect(order).toEqual([3, 2, 1]);
        expect(tracker.count).toBe(0);
    });
});
