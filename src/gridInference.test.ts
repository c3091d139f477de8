import {describe, expect, it} from 'vitest';
import {
    captureCurrentLayout,
    createRegularGridSlots,
    findUniquePositions,
    inferGridSlots,
    optimizeCapturedLayout,
} from './gridInference.js';
import {assignWindowsToSlots} from './layoutAssignment.js';
import {LayoutError} from './utils/errors.js';
import {FakeDisplays, managedWindow, windowType} from './testing/fakes.js';
import type {Layout, Slot} from './types/layout.js';

const DISPLAY = {x: 0, y: 0, width: 1600, height: 900};

function slotAt(id: string, x: number, y: number, displayId = 1): Slot {
    return {id, frame: {x, y, width: 480, height: 380}, displayId, priority: 0};
}

describe('findUniquePositions', () => {
    it('keeps the first value of each cluster', () => {
        expect(findUniquePositions([0, 10, 20, 40], 15)).toEqual([0, 20, 40]);
        expect(findUniquePositions([500, 0, 505], 15)).toEqual([500, 0]);
    });
});

describe('inferGridSlots', () => {
    it('returns a perfect 2×3 grid at the same positions', () => {
        const slots = [
            slotAt('a', 0, 0), slotAt('b', 500, 0), slotAt('c', 1000, 0),
            slotAt('d', 0, 400), slotAt('e', 500, 400), slotAt('f', 1000, 400),
        ];

        const result = inferGridSlots(slots, DISPLAY);

        expect(result.map(s => s.id)).toEqual(['0_0', '0_1', '0_2', '1_0', '1_1', '1_2']);
        expect(result.map(s => [s.frame.x, s.frame.y])).toEqual([
            [0, 0], [500, 0], [1000, 0],
            [0, 400], [500, 400], [1000, 400],
        ]);
        expect(result[0].frame.width).toBeCloseTo(475);
        expect(result[0].frame.height).toBeCloseTo(380);
        expect(result[5].frame.width).toBe(500);
        expect(result[5].frame.height).toBe(400);
    });

    it('clusters jittered edges within the tolerance', () => {
        const slots = [
            slotAt('a', 3, 0), slotAt('b', 505, 8),
            slotAt('c', 0, 402), slotAt('d', 498, 397),
        ];

        const result = inferGridSlots(slots, DISPLAY);

        expect(result).toHaveLength(4);
        expect(result.map(s => [s.frame.x, s.frame.y])).toEqual([
            [3, 0], [505, 0],
            [3, 402], [505, 402],
        ]);
    });

    it('falls back to a regular grid for scattered slots', () => {
        const slots = [
            slotAt('a', 0, 0), slotAt('b', 100, 50), slotAt('c', 300, 200),
            slotAt('d', 700, 450), slotAt('e', 1100, 600),
        ];

        const result = inferGridSlots(slots, DISPLAY);

        // floor(sqrt(5)) = 2 columns, ceil(5 / 2) = 3 rows
        expect(result.map(s => s.id)).toEqual(['0_0', '0_1', '1_0', '1_1', '2_0', '2_1']);
        expect(result[0].frame).toEqual({x: 40, y: 22.5, width: 760, height: 285});
        expect(result[5].frame).toEqual({x: 800, y: 592.5, width: 760, height: 285});
    });

    it('keeps fewer than three slots unchanged', () => {
        const slots = [slotAt('a', 7, 9), slotAt('b', 900, 300)];
        const result = inferGridSlots(slots, null);

        expect(result).toEqual(slots);
        expect(result).not.toBe(slots);
    });

    it('throws INVALID_GEOMETRY when the fallback has no usable bounds', () => {
        const slots = [slotAt('a', 0, 0), slotAt('b', 100, 50), slotAt('c', 300, 200), slotAt('d', 700, 450), slotAt('e', 1100, 600)];

        expect(() => inferGridSlots(slots, null)).toThrow(LayoutError);
        expect(() => inferGridSlots(slots, {x: 0, y: 0, width: 0, height: 900})).toThrow(LayoutError);
    });
});

describe('createRegularGridSlots', () => {
    it('offsets cells by the display origin', () => {
        const slots = createRegularGridSlots(1, 2, {x: 1600, y: 100, width: 1000, height: 500}, 2);
        expect(slots.map(s => s.frame)).toEqual([
            {x: 1625, y: 112.5, width: 475, height: 475},
            {x: 2100, y: 112.5, width: 475, height: 475},
        ]);
        expect(slots.every(s => s.displayId === 2)).toBe(true);
    });
});

describe('captureCurrentLayout', () => {
    it('creates one slot per window at its current frame', () => {
        const type = windowType('t');
        const windows = Array.from({length: 6}, (_, i) => managedWindow(i + 1, type, {
            frame: {x: i * 10, y: 0, width: 100, height: 80},
            displayId: i < 3 ? 1 : 2,
        }));

        const layout = captureCurrentLayout(windows);

        expect(layout.name).toBe('Captured Layout');
        expect(layout.matchingStrategy).toBe('sequential');
        expect(layout.slots.map(s => s.id)).toEqual(['0_0', '0_1', '0_2', '0_3', '1_0', '1_1']);
        expect(layout.slots[4]).toEqual({id: '1_0', frame: {x: 40, y: 0, width: 100, height: 80}, displayId: 2, priority: 0});
    });
});

describe('optimizeCapturedLayout', () => {
    it('infers each display separately in order of first appearance', () => {
        const displays = new FakeDisplays([
            {id: 1, bounds: DISPLAY},
            {id: 2, bounds: {x: 1600, y: 0, width: 1600, height: 900}},
        ]);
        const captured: Layout = {
            id: 'captured',
            name: 'Captured Layout',
            matchingStrategy: 'byType',
            slots: [
                slotAt('x', 1700, 0, 2),
                slotAt('a', 0, 0), slotAt('b', 500, 0), slotAt('c', 1000, 0),
                slotAt('y', 2200, 0, 2),
            ],
        };

        const optimized = optimizeCapturedLayout(captured, displays);

        expect(optimized.name).toBe('Optimized Captured Layout');
        expect(optimized.matchingStrategy).toBe('byType');
        expect(optimized.id).not.toBe('captured');
        expect(optimized.slots.map(s => s.id)).toEqual(['2:x', '2:y', '1:0_0', '1:0_1', '1:0_2']);
        expect(optimized.slots.map(s => s.displayId)).toEqual([2, 2, 1, 1, 1]);
    });

    it('keeps plain ids for a single display', () => {
        const captured: Layout = {
            id: 'captured',
            name: 'Captured Layout',
            matchingStrategy: 'sequential',
            slots: [slotAt('a', 0, 0), slotAt('b', 500, 0), slotAt('c', 1000, 0)],
        };

        const optimized = optimizeCapturedLayout(captured, new FakeDisplays([{id: 1, bounds: DISPLAY}]));

        expect(optimized.slots.map(s => s.id)).toEqual(['0_0', '0_1', '0_2']);
    });

    it('gives every display distinct slot ids so byType can overflow across displays', () => {
        const displays = new FakeDisplays([
            {id: 1, bounds: DISPLAY},
            {id: 2, bounds: {x: 1600, y: 0, width: 1600, height: 900}},
        ]);
        const type = windowType('t');
        const captured = captureCurrentLayout([0, 500, 1000, 1600, 2100, 2600].map((x, i) => managedWindow(i + 1, type, {
            frame: {x, y: 0, width: 480, height: 400},
            displayId: x < 1600 ? 1 : 2,
        })));

        const optimized = optimizeCapturedLayout({...captured, matchingStrategy: 'byType'}, displays);
        expect(optimized.slots.map(s => s.id)).toEqual(['1:0_0', '1:0_1', '1:0_2', '2:0_0', '2:0_1', '2:0_2']);

        const windows = [1, 2, 3, 4].map(id => managedWindow(id, type));
        const assignments = assignWindowsToSlots(optimized, windows);

        expect(assignments.map(a => `${a.window.id}->${a.slot.id}`)).toEqual(['1->1:0_0', '2->1:0_1', '3->1:0_2', '4->2:0_0']);
    });
});
