/**
 * Layout generators - Parametric grid builders
 *
 * Every generator is a pure function of its parameters (apart from the fresh
 * layout id). Slot ids are "row_col" and every slot has priority 0.
 */

import {randomUUID} from 'node:crypto';
import type {DisplayId, Rect} from './types/geometry.js';
import type {Layout, Slot} from './types/layout.js';
import {LayoutError, LayoutErrorCode} from './utils/errors.js';
import {assertPositiveCount, assertUsableBounds} from './utils/geometry.js';

/** Width/height ratio of a typical poker table window */
export const DEFAULT_TABLE_ASPECT_RATIO = 1.25;

/** Cells within this distance of the target ratio keep their natural size */
export const ASPECT_RATIO_TOLERANCE = 0.2;

export const MAX_OVERLAP = 0.5;

export interface GridDimensions {
    rows: number;
    columns: number;
}

// Near-square grids for small table counts, indexed by count
const SMALL_COUNT_GRIDS: Record<number, GridDimensions> = {
    1: {rows: 1, columns: 1},
    2: {rows: 1, columns: 2},
    3: {rows: 2, columns: 2},
    4: {rows: 2, columns: 2},
    5: {rows: 2, columns: 3},
    6: {rows: 2, columns: 3},
    7: {rows: 3, columns: 3},
    8: {rows: 3, columns: 3},
    9: {rows: 3, columns: 3},
    10: {rows: 3, columns: 4},
    11: {rows: 3, columns: 4},
    12: {rows: 3, columns: 4},
    13: {rows: 4, columns: 4},
    14: {rows: 4, columns: 4},
    15: {rows: 4, columns: 4},
    16: {rows: 4, columns: 4},
};

function slot(row: number, col: number, frame: Rect, displayId: DisplayId): Slot {
    return {id: `${row}_${col}`, frame, displayId, priority: 0};
}

/**
 * Uniform grid covering the whole display
 *
 * @throws LayoutError with INVALID_GEOMETRY for bad dimensions or bounds
 */
export function createGridLayout(rows: number, columns: number, displayId: DisplayId, bounds: Rect): Layout {
    assertPositiveCount(rows, 'rows');
    assertPositiveCount(columns, 'columns');
    assertUsableBounds(bounds);

    const slotWidth = bounds.width / columns;
    const slotHeight = bounds.height / rows;

    const slots: Slot[] = [];
    for (let row = 0; row < rows; row++) {
        for (let col = 0; col < columns; col++) {
            slots.push(slot(row, col, {
                x: bounds.x + slotWidth * col,
                y: bounds.y + slotHeight * row,
                width: slotWidth,
                height: slotHeight,
            }, displayId));
        }
    }

    return {
        id: randomUUID(),
        name: `Grid ${rows}×${columns}`,
        slots,
        matchingStrategy: 'sequential',
    };
}

/**
 * Grid whose neighbouring cells deliberately overlap
 * Fits more tables on small screens where full separation is not needed.
 *
 * @param overlap - Fraction of a cell shared with its neighbour, clamped to [0, 0.5]
 * @throws LayoutError with INVALID_GEOMETRY for bad dimensions or bounds
 */
export function createOverlappingGridLayout(
    rows: number,
    columns: number,
    overlap: number,
    displayId: DisplayId,
    bounds: Rect,
): Layout {
    assertPositiveCount(rows, 'rows');
    assertPositiveCount(columns, 'columns');
    assertUsableBounds(bounds);

    const safeOverlap = Number.isFinite(overlap) ? Math.min(Math.max(overlap, 0), MAX_OVERLAP) : 0;

    const baseWidth = bounds.width / columns;
    const baseHeight = bounds.height / rows;
    const width = baseWidth * (1 + safeOverlap);
    const height = baseHeight * (1 + safeOverlap);

    const slots: Slot[] = [];
    for (let row = 0; row < rows; row++) {
        for (let col = 0; col < columns; col++) {
            slots.push(slot(row, col, {
                x: bounds.x + baseWidth * col * (1 - safeOverlap),
                y: bounds.y + baseHeight * row * (1 - safeOverlap),
                width,
                height,
            }, displayId));
        }
    }

    return {
        id: randomUUID(),
        name: `Overlapping Grid ${rows}×${columns}`,
        slots,
        matchingStrategy: 'sequential',
    };
}

/**
 * Near-square grid able to hold the given number of tables
 *
 * @throws LayoutError with INVALID_GEOMETRY for a non-positive count
 */
export function calculateOptimalGrid(count: number): GridDimensions {
    assertPositiveCount(count, 'count');

    const known = SMALL_COUNT_GRIDS[count];
    if (known) {
        return {...known};
    }

    const side = Math.floor(Math.sqrt(count));
    if (side * side >= count) {
        return {rows: side, columns: side};
    }
    if (side * (side + 1) >= count) {
        return {rows: side, columns: side + 1};
    }
    return {rows: side + 1, columns: side + 1};
}

/**
 * Grid of table-shaped cells
 *
 * When the natural cell ratio is more than ASPECT_RATIO_TOLERANCE away from
 * the target, the cell is narrowed (too wide) or shortened (too tall) and
 * centred within its grid cell. At most `count` slots are produced.
 *
 * @throws LayoutError with INVALID_GEOMETRY for bad count, ratio or bounds
 */
export function createPokerLayout(
    count: number,
    displayId: DisplayId,
    bounds: Rect,
    targetAspectRatio: number = DEFAULT_TABLE_ASPECT_RATIO,
): Layout {
    assertUsableBounds(bounds);
    const {rows, columns} = calculateOptimalGrid(count);
    if (!Number.isFinite(targetAspectRatio) || targetAspectRatio <= 0) {
        throw new LayoutError(
            LayoutErrorCode.INVALID_GEOMETRY,
            `Target aspect ratio must be a positive number, got ${targetAspectRatio}`,
            {targetAspectRatio},
        );
    }

    const rawWidth = bounds.width / columns;
    const rawHeight = bounds.height / rows;
    const currentRatio = rawWidth / rawHeight;

    let width = rawWidth;
    let height = rawHeight;

    if (Math.abs(currentRatio - targetAspectRatio) > ASPECT_RATIO_TOLERANCE) {
        if (currentRatio > targetAspectRatio) {
            width = height * targetAspectRatio;
        } else {
            height = width / targetAspectRatio;
        }
    }

    const xOffset = (rawWidth - width) / 2;
    const yOffset = (rawHeight - height) / 2;

    const slots: Slot[] = [];
    for (let row = 0; row < rows && slots.length < count; row++) {
        for (let col = 0; col < columns && slots.length < count; col++) {
            slots.push(slot(row, col, {
                x: bounds.x + rawWidth * col + xOffset,
                y: bounds.y + rawHeight * row + yOffset,
                width,
                height,
            }, displayId));
        }
    }

    return {
        id: randomUUID(),
        name: `Poker ${count} Tables`,
        slots,
        matchingStrategy: 'sequential',
    };
}
