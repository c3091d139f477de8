import {describe, expect, it} from 'vitest';
import {assignmentsByWindow, assignWindowsToSlots, sortSlotsByPriority, unplacedWindows} from './layoutAssignment.js';
import {LayoutError, LayoutErrorCode} from './utils/errors.js';
import {managedWindow, windowType} from './testing/fakes.js';
import type {Layout, MatchingStrategy, Slot, SlotAssignment} from './types/layout.js';

const typeA = windowType('A');
const typeB = windowType('B');

function slot(id: string, priority: number, displayId = 1): Slot {
    return {id, frame: {x: 0, y: 0, width: 100, height: 100}, displayId, priority};
}

function layout(slots: Slot[], matchingStrategy: MatchingStrategy = 'sequential'): Layout {
    return {id: 'layout', name: 'Test', slots, matchingStrategy};
}

function pairs(assignments: readonly SlotAssignment[]): string[] {
    return assignments.map(a => `${a.window.id}->${a.slot.id}`);
}

describe('sortSlotsByPriority', () => {
    it('orders by descending priority and keeps layout order for ties', () => {
        const sorted = sortSlotsByPriority([slot('a', 0), slot('b', 5), slot('c', 0), slot('d', 5)]);
        expect(sorted.map(s => s.id)).toEqual(['b', 'd', 'a', 'c']);
    });
});

describe('assignWindowsToSlots', () => {
    it('rejects a layout without slots', () => {
        expect(() => assignWindowsToSlots(layout([]), [])).toThrow(LayoutError);
        try {
            assignWindowsToSlots(layout([]), []);
        } catch (error) {
            expect(error instanceof LayoutError && error.code).toBe(LayoutErrorCode.EMPTY_LAYOUT);
        }
    });

    it('rejects an unknown matching strategy', () => {
        const unknown = layout([slot('s1', 0)]);
        // Stored records can carry strategies this version does not know
        Reflect.set(unknown, 'matchingStrategy', 'diagonal');

        expect(() => assignWindowsToSlots(unknown, [managedWindow(1, typeA)])).toThrow('Unknown matching strategy: diagonal');
        try {
            assignWindowsToSlots(unknown, [managedWindow(1, typeA)]);
        } catch (error) {
            expect(error instanceof LayoutError && error.code).toBe(LayoutErrorCode.UNKNOWN_STRATEGY);
        }
    });

    describe('sequential', () => {
        it('gives every window a distinct slot when slots suffice', () => {
            const slots = [slot('s1', 1), slot('s2', 3), slot('s3', 2), slot('s4', 0)];
            const windows = [1, 2, 3].map(id => managedWindow(id, typeA));

            const assignments = assignWindowsToSlots(layout(slots), windows);

            expect(pairs(assignments)).toEqual(['1->s2', '2->s3', '3->s1']);
            expect(new Set(assignments.map(a => a.slot.id)).size).toBe(3);
        });

        it('keeps windows on their own display', () => {
            const slots = [slot('d1', 0, 1), slot('d2', 0, 2)];
            const windows = [
                managedWindow(1, typeA, {displayId: 2}),
                managedWindow(2, typeA, {displayId: 1}),
                managedWindow(3, typeA, {displayId: 1}),
            ];

            const assignments = assignWindowsToSlots(layout(slots), windows);

            expect(pairs(assignments)).toEqual(['1->d2', '2->d1']);
            expect(unplacedWindows(windows, assignments).map(w => w.id)).toEqual([3]);
        });

        it('is deterministic', () => {
            const slots = [slot('a', 1), slot('b', 1), slot('c', 2)];
            const windows = [3, 1, 2].map(id => managedWindow(id, id === 1 ? typeB : typeA));

            for (const strategy of ['sequential', 'byType'] as const) {
                const first = assignWindowsToSlots(layout(slots, strategy), windows);
                const second = assignWindowsToSlots(layout(slots, strategy), windows);
                expect(pairs(second)).toEqual(pairs(first));
            }
        });

        it('ignores repeated window ids', () => {
            const windows = [managedWindow(1, typeA), managedWindow(1, typeA, {title: 'Again'})];
            const assignments = assignWindowsToSlots(layout([slot('a', 0), slot('b', 0)]), windows);

            expect(pairs(assignments)).toEqual(['1->a']);
        });
    });

    describe('byType', () => {
        it('groups types on the highest-priority slots in input order', () => {
            const slots = [slot('p6', 6), slot('p5', 5), slot('p4', 4), slot('p3', 3), slot('p2', 2), slot('p1', 1)];
            const windows = [
                managedWindow(1, typeA),
                managedWindow(2, typeB),
                managedWindow(3, typeA),
                managedWindow(4, typeA),
                managedWindow(5, typeB),
                managedWindow(6, typeA),
            ];

            const assignments = assignWindowsToSlots(layout(slots, 'byType'), windows);

            expect(pairs(assignments)).toEqual(['1->p6', '3->p5', '4->p4', '6->p3', '2->p2', '5->p1']);
            expect(unplacedWindows(windows, assignments)).toEqual([]);
        });

        it('falls back to a free slot on another display', () => {
            const slots = [slot('d1', 0, 1), slot('d2a', 0, 2), slot('d2b', 0, 2)];
            const windows = [
                managedWindow(1, typeA, {displayId: 1}),
                managedWindow(2, typeB, {displayId: 1}),
            ];

            const assignments = assignWindowsToSlots(layout(slots, 'byType'), windows);

            expect(pairs(assignments)).toEqual(['1->d1', '2->d2a']);
        });

        it('fills each display from its own pool with mixed types', () => {
            const slots = [
                slot('a1', 3, 1), slot('a2', 2, 1), slot('a3', 1, 1),
                slot('b1', 2, 2), slot('b2', 1, 2), slot('b3', 0, 2),
            ];
            const windows = [
                managedWindow(1, typeA, {displayId: 1}),
                managedWindow(2, typeB, {displayId: 2}),
                managedWindow(3, typeA, {displayId: 2}),
                managedWindow(4, typeB, {displayId: 1}),
                managedWindow(5, typeA, {displayId: 1}),
                managedWindow(6, typeB, {displayId: 2}),
                managedWindow(7, typeB, {displayId: 1}),
            ];

            const assignments = assignWindowsToSlots(layout(slots, 'byType'), windows);

            expect(pairs(assignments)).toEqual(['1->a1', '5->a2', '4->a3', '3->b1', '2->b2', '6->b3']);
            expect(unplacedWindows(windows, assignments).map(w => w.id)).toEqual([7]);
        });

        it('sends an overflowing window to the spare slots of the other display', () => {
            const slots = [slot('a1', 1, 1), slot('a2', 0, 1), slot('b1', 1, 2), slot('b2', 0, 2), slot('b3', 0, 2)];
            const windows = [
                managedWindow(1, typeA, {displayId: 1}),
                managedWindow(2, typeB, {displayId: 2}),
                managedWindow(3, typeB, {displayId: 1}),
                managedWindow(4, typeA, {displayId: 1}),
            ];

            const assignments = assignWindowsToSlots(layout(slots, 'byType'), windows);

            expect(pairs(assignments)).toEqual(['1->a1', '4->a2', '2->b1', '3->b2']);
        });

        it('leaves windows unplaced once every slot is used', () => {
            const windows = [1, 2, 3].map(id => managedWindow(id, typeA));
            const assignments = assignWindowsToSlots(layout([slot('only', 0)], 'byType'), windows);

            expect(pairs(assignments)).toEqual(['1->only']);
            expect(unplacedWindows(windows, assignments).map(w => w.id)).toEqual([2, 3]);
        });
    });
});

describe('assignmentsByWindow', () => {
    it('indexes slots by window id', () => {
        const assignments = assignWindowsToSlots(layout([slot('a', 0)]), [managedWindow(9, typeA)]);
        expect(assignmentsByWindow(assignments).get(9)?.id).toBe('a');
    });
});
