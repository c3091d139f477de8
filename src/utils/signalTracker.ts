/**
 * SignalTracker - Utility for tracking and cleaning up signal connections
 *
 * Prevents leaked handlers by ensuring every subscription a component makes
 * is disconnected when the component is disabled.
 *
 * Usage:
 *   constructor() {
 *     this._signalTracker = new SignalTracker('MyComponent');
 *   }
 *
 *   enable() {
 *     settings.connect('changed::hover-delay', this._onHoverDelayChanged, this._signalTracker);
 *   }
 *
 *   disable() {
 *     this._signalTracker.disconnectAll();
 *   }
 */

import {createLogger} from './debug.js';
import {errorMessage} from './errors.js';
import type {Connectable} from './signalEmitter.js';

const logger = createLogger('SignalTracker');

interface SignalConnection {
    object: Connectable;
    id: number;
    signal: string;
}

export class SignalTracker {
    private _componentName: string;
    private _connections: SignalConnection[];

    /**
     * @param componentName - Name of the component for debugging
     */
    constructor(componentName: string) {
        this._componentName = componentName;
        this._connections = [];

        logger.memdebug(`SignalTracker created for ${componentName}`);
    }

    /**
     * Track a connection made on a signal emitter
     * Usually called by SignalEmitter.connect() when handed a tracker.
     *
     * @returns The signal ID
     */
    track(object: Connectable, id: number, signal: string): number {
        this._connections.push({object, id, signal});

        logger.memdebug(`${this._componentName}: Connected ${signal} (ID: ${id})`);

        return id;
    }

    /**
     * Disconnect a specific signal by ID
     *
     * @returns True if disconnected, false if not found
     */
    disconnect(signalId: number): boolean {
        const index = this._connections.findIndex(conn => conn.id === signalId);

        if (index === -1) {
            logger.warn(`${this._componentName}: Signal ID ${signalId} not found`);
            return false;
        }

        const {object, id, signal} = this._connections[index];

        try {
            object.disconnect(id);
            this._connections.splice(index, 1);
            logger.memdebug(`${this._componentName}: Disconnected ${signal} (ID: ${id})`);
            return true;
        } catch (e) {
            logger.error(`${this._componentName}: Failed to disconnect ${signal} (ID: ${id}): ${errorMessage(e)}`);
            return false;
        }
    }

    /**
     * Disconnect all tracked signals, last connected first
     */
    disconnectAll(): void {
        const count = this._connections.length;

        if (count === 0) {
            logger.memdebug(`${this._componentName}: No signals to disconnect`);
            return;
        }

        let failed = 0;

        for (let connection = this._connections.pop(); connection; connection = this._connections.pop()) {
            const {object, id, signal} = connection;

            try {
                object.disconnect(id);
                logger.memdebug(`${this._componentName}: Disconnected ${signal} (ID: ${id})`);
            } catch (e) {
                logger.warn(`${this._componentName}: Failed to disconnect ${signal} (ID: ${id}): ${errorMessage(e)}`);
                failed++;
            }
        }

        if (failed > 0) {
            logger.warn(`${this._componentName}: Disconnected ${count - failed}/${count} signals (${failed} failed)`);
        }
    }

    get count(): number {
        return this._connections.length;
    }

    hasConnections(): boolean {
        return this._connections.length > 0;
    }
}
