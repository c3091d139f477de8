/**
 * Core type definitions for layouts, slots and configurations
 */

import type {DisplayId, Rect} from './geometry.js';
import type {ManagedWindow} from './window.js';

/**
 * How windows are distributed over the slots of a layout
 */
export type MatchingStrategy = 'sequential' | 'byType';

/**
 * Slot definition - placement target for a single window
 * Frames are absolute screen coordinates on the slot's display
 */
export interface Slot {
    readonly id: string;          // Unique within its layout, e.g. "0_1"
    readonly frame: Rect;
    readonly displayId: DisplayId;
    readonly priority: number;    // Higher fills first
}

/**
 * Layout definition - named collection of slots
 */
export interface Layout {
    readonly id: string;
    readonly name: string;
    readonly slots: readonly Slot[];
    readonly matchingStrategy: MatchingStrategy;
}

/**
 * Condition under which a configuration activates itself
 */
export type AutoActivationCondition =
    | {readonly type: 'windowCount'; readonly count: number}
    | {readonly type: 'windowTypeCount'; readonly typeCounts: Readonly<Record<string, number>>};

/**
 * Configuration - a stored layout plus its activation rule
 */
export interface Configuration {
    readonly id: string;
    readonly name: string;
    readonly layout: Layout;
    readonly autoActivation: AutoActivationCondition | null;
}

/**
 * One window placed into one slot
 */
export interface SlotAssignment {
    readonly window: ManagedWindow;
    readonly slot: Slot;
}
