/**
 * SignalEmitter - Typed connect/disconnect signals on top of node:events
 *
 * Subscriptions are identified by numeric ids so owners can track and drop
 * them with a SignalTracker. A throwing handler is logged and does not stop
 * the remaining handlers.
 */

import {EventEmitter} from 'node:events';
import {createLogger} from './debug.js';
import {errorMessage} from './errors.js';
import type {SignalTracker} from './signalTracker.js';

const logger = createLogger('SignalEmitter');

type Listener = Parameters<EventEmitter['on']>[1];

export type SignalMap = Record<string, unknown[]>;

export interface Connectable {
    disconnect(id: number): void;
}

interface Subscription {
    signal: string;
    listener: Listener;
}

export class SignalEmitter<Signals extends SignalMap> implements Connectable {
    private _emitter = new EventEmitter();
    private _subscriptions = new Map<number, Subscription>();
    private _nextSignalId = 1;

    /**
     * Subscribe to a signal
     *
     * @param tracker - Optional tracker that will own the subscription
     * @returns Subscription id for disconnect()
     */
    connect<S extends keyof Signals & string>(
        signal: S,
        handler: (...args: Signals[S]) => void,
        tracker?: SignalTracker,
    ): number {
        const id = this._nextSignalId++;
        const listener = (...args: Signals[S]): void => {
            try {
                handler(...args);
            } catch (e) {
                logger.error(`Handler for '${signal}' (ID: ${id}) failed: ${errorMessage(e)}`);
            }
        };

        this._subscriptions.set(id, {signal, listener});
        this._emitter.on(signal, listener);
        tracker?.track(this, id, signal);
        return id;
    }

    /**
     * @throws Error if the id is not an active subscription
     */
    disconnect(id: number): void {
        const subscription = this._subscriptions.get(id);
        if (!subscription) {
            throw new Error(`Signal ID ${id} is not connected`);
        }
        this._emitter.off(subscription.signal, subscription.listener);
        this._subscriptions.delete(id);
    }

    get connectionCount(): number {
        return this._subscriptions.size;
    }

    protected emit<S extends keyof Signals & string>(signal: S, ...args: Signals[S]): void {
        this._emitter.emit(signal, ...args);
    }
}
