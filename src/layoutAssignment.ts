/**
 * Layout assignment - Maps detected windows onto the slots of a layout
 *
 * Assignment is a pure function of (layout, windows): identical inputs give
 * identical results, and no slot is handed out twice. Windows that find no
 * slot are simply left where they are.
 *
 * Strategies:
 * - sequential: per display, the i-th window takes the i-th slot by priority
 * - byType: per display, windows of the same type take consecutive slots;
 *   leftovers fill remaining slots, then any slot in the layout
 */

import type {Layout, Slot, SlotAssignment} from './types/layout.js';
import type {ManagedWindow} from './types/window.js';
import {createLogger} from './utils/debug.js';
import {LayoutError, LayoutErrorCode} from './utils/errors.js';

const logger = createLogger('LayoutAssignment');

/**
 * Group items by key, keeping groups in order of first appearance
 */
function groupBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
    const groups = new Map<K, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        const group = groups.get(key);
        if (group) {
            group.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}

/**
 * Slots sorted by priority, highest first; ties keep layout order
 */
export function sortSlotsByPriority(slots: readonly Slot[]): Slot[] {
    return [...slots].sort((a, b) => b.priority - a.priority);
}

/**
 * Drop repeated window ids, keeping the first record
 */
function uniqueWindows(windows: readonly ManagedWindow[]): ManagedWindow[] {
    const seen = new Set<number>();
    return windows.filter(window => {
        if (seen.has(window.id)) return false;
        seen.add(window.id);
        return true;
    });
}

function assignSequentially(slots: readonly Slot[], windows: readonly ManagedWindow[]): SlotAssignment[] {
    const assignments: SlotAssignment[] = [];
    const slotsByDisplay = groupBy(slots, slot => slot.displayId);
    const windowsByDisplay = groupBy(windows, window => window.displayId);

    for (const [displayId, displayWindows] of windowsByDisplay) {
        const sortedSlots = sortSlotsByPriority(slotsByDisplay.get(displayId) ?? []);

        displayWindows.forEach((window, index) => {
            if (index < sortedSlots.length) {
                assignments.push({window, slot: sortedSlots[index]});
            }
        });

        if (displayWindows.length > sortedSlots.length) {
            logger.debug(`Display ${displayId}: ${displayWindows.length - sortedSlots.length} window(s) left unplaced`);
        }
    }

    return assignments;
}

function assignByType(slots: readonly Slot[], windows: readonly ManagedWindow[]): SlotAssignment[] {
    const assignments: SlotAssignment[] = [];
    const assigned = new Set<number>();

    const place = (window: ManagedWindow, slot: Slot): void => {
        assignments.push({window, slot});
        assigned.add(window.id);
    };

    const slotsByDisplay = groupBy(slots, slot => slot.displayId);
    const windowsByType = groupBy(windows, window => window.type.id);

    for (const [displayId, displaySlots] of slotsByDisplay) {
        const pool = sortSlotsByPriority(displaySlots);

        // Same-type windows take consecutive slots from the front of the pool
        for (const typeWindows of windowsByType.values()) {
            const onDisplay = typeWindows.filter(window => window.displayId === displayId);
            if (onDisplay.length === 0) {
                continue;
            }

            const taken = pool.splice(0, Math.min(onDisplay.length, pool.length));
            taken.forEach((slot, i) => place(onDisplay[i], slot));

            if (pool.length === 0) {
                break;
            }
        }

        const leftovers = windows.filter(window => window.displayId === displayId && !assigned.has(window.id));
        leftovers.forEach((window, index) => {
            if (index < pool.length) {
                place(window, pool[index]);
            }
        });
    }

    // Last resort: any unused slot anywhere, even on another display
    const unassigned = windows.filter(window => !assigned.has(window.id));
    if (unassigned.length > 0) {
        const usedSlotIds = new Set(assignments.map(a => a.slot.id));
        const unusedSlots = slots.filter(slot => !usedSlotIds.has(slot.id));

        unassigned.forEach((window, index) => {
            if (index < unusedSlots.length) {
                const slot = unusedSlots[index];
                if (slot.displayId !== window.displayId) {
                    logger.debug(`Window ${window.id} placed on display ${slot.displayId} (own display ${window.displayId} has no free slot)`);
                }
                place(window, slot);
            }
        });
    }

    return assignments;
}

/**
 * Assign windows to the slots of a layout
 *
 * @param layout - Layout to fill
 * @param windows - Current window snapshot, in detection order
 * @returns Ordered window → slot pairs; unplaced windows are absent
 * @throws LayoutError with EMPTY_LAYOUT or UNKNOWN_STRATEGY
 */
export function assignWindowsToSlots(layout: Layout, windows: readonly ManagedWindow[]): SlotAssignment[] {
    if (layout.slots.length === 0) {
        throw new LayoutError(LayoutErrorCode.EMPTY_LAYOUT, `Layout '${layout.name}' has no slots`, {layoutId: layout.id});
    }

    const candidates = uniqueWindows(windows);
    const strategy: string = layout.matchingStrategy;

    switch (layout.matchingStrategy) {
    case 'sequential':
        return assignSequentially(layout.slots, candidates);
    case 'byType':
        return assignByType(layout.slots, candidates);
    default:
        throw new LayoutError(
            LayoutErrorCode.UNKNOWN_STRATEGY,
            `Unknown matching strategy: ${strategy}`,
            {layoutId: layout.id, strategy},
        );
    }
}

/**
 * Index assignments by window id
 */
export function assignmentsByWindow(assignments: readonly SlotAssignment[]): Map<number, Slot> {
    return new Map(assignments.map(a => [a.window.id, a.slot]));
}

/**
 * Windows that did not receive a slot, in input order
 */
export function unplacedWindows(windows: readonly ManagedWindow[], assignments: readonly SlotAssignment[]): ManagedWindow[] {
    const placed = new Set(assignments.map(a => a.window.id));
    return windows.filter(window => !placed.has(window.id));
}
