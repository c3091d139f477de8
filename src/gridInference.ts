/**
 * Grid inference - Turns an observed window arrangement into a clean grid
 *
 * Two tiers, evaluated per display:
 * 1. Detect structure: cluster the left and top edges of the captured slots
 *    and, when the implied rows × columns grid is dense enough for the number
 *    of windows, emit one slot per cell at the clustered positions.
 * 2. Regularize: otherwise ignore the observed positions and lay out an even
 *    grid over 95% of the display.
 *
 * Sets of fewer than three slots carry too little signal and are returned
 * unchanged.
 */

import {randomUUID} from 'node:crypto';
import type {DisplayId, Rect} from './types/geometry.js';
import type {Layout, Slot} from './types/layout.js';
import type {ManagedWindow} from './types/window.js';
import type {DisplayProvider} from './types/platform.js';
import {createLogger} from './utils/debug.js';
import {LayoutError, LayoutErrorCode} from './utils/errors.js';
import {assertUsableBounds, mean} from './utils/geometry.js';

const logger = createLogger('GridInference');

/** Edges closer than this are treated as the same grid line */
export const GRID_POSITION_TOLERANCE = 15;

/** Share of the available space a generated cell fills */
const CELL_FILL = 0.95;

const MIN_SLOTS_FOR_INFERENCE = 3;

export interface GridInferenceOptions {
    tolerance?: number;
}

/**
 * Cluster positions that lie within tolerance of each other
 * Each cluster is represented by the first value that opened it.
 *
 * @returns Cluster representatives in first-seen order
 */
export function findUniquePositions(positions: readonly number[], tolerance: number): number[] {
    const unique: number[] = [];

    for (const position of positions) {
        if (!unique.some(existing => Math.abs(existing - position) <= tolerance)) {
            unique.push(position);
        }
    }

    return unique;
}

/**
 * Mean distance between consecutive sorted positions
 * Falls back to the provided value when fewer than two positions exist.
 */
function averageGap(sorted: readonly number[], fallback: number): number {
    if (sorted.length < 2) {
        return fallback;
    }

    const gaps: number[] = [];
    for (let i = 0; i < sorted.length - 1; i++) {
        gaps.push(sorted[i + 1] - sorted[i]);
    }
    return mean(gaps);
}

function cellSlot(row: number, col: number, frame: Rect, displayId: DisplayId): Slot {
    return {id: `${row}_${col}`, frame, displayId, priority: 0};
}

/**
 * Slots at clustered grid positions
 * Each cell spans 95% of the gap to the next line; the last row and column use the average.
 */
function createGridSlotsWithSpacing(
    xPositions: readonly number[],
    yPositions: readonly number[],
    avgWidth: number,
    avgHeight: number,
    displayId: DisplayId,
): Slot[] {
    const slots: Slot[] = [];

    for (let row = 0; row < yPositions.length; row++) {
        const height = row < yPositions.length - 1
            ? (yPositions[row + 1] - yPositions[row]) * CELL_FILL
            : avgHeight;

        for (let col = 0; col < xPositions.length; col++) {
            const width = col < xPositions.length - 1
                ? (xPositions[col + 1] - xPositions[col]) * CELL_FILL
                : avgWidth;

            slots.push(cellSlot(row, col, {x: xPositions[col], y: yPositions[row], width, height}, displayId));
        }
    }

    return slots;
}

/**
 * Even grid over 95% of the display, centred
 */
export function createRegularGridSlots(rows: number, columns: number, displayBounds: Rect, displayId: DisplayId): Slot[] {
    const usableWidth = displayBounds.width * CELL_FILL;
    const usableHeight = displayBounds.height * CELL_FILL;
    const xOffset = (displayBounds.width - usableWidth) / 2;
    const yOffset = (displayBounds.height - usableHeight) / 2;

    const slotWidth = usableWidth / columns;
    const slotHeight = usableHeight / rows;

    const slots: Slot[] = [];
    for (let row = 0; row < rows; row++) {
        for (let col = 0; col < columns; col++) {
            slots.push(cellSlot(row, col, {
                x: displayBounds.x + xOffset + slotWidth * col,
                y: displayBounds.y + yOffset + slotHeight * row,
                width: slotWidth,
                height: slotHeight,
            }, displayId));
        }
    }

    return slots;
}

/**
 * Infer a grid from the slots of a single display
 *
 * @param slots - Captured slots, all on the same display
 * @param displayBounds - Bounds of that display; only read by the regular-grid fallback
 * @throws LayoutError with INVALID_GEOMETRY when the fallback has no usable bounds
 */
export function inferGridSlots(
    slots: readonly Slot[],
    displayBounds: Rect | null,
    {tolerance = GRID_POSITION_TOLERANCE}: GridInferenceOptions = {},
): Slot[] {
    if (slots.length < MIN_SLOTS_FOR_INFERENCE) {
        logger.debug(`Too few slots (${slots.length}) to detect grid pattern, keeping original`);
        return [...slots];
    }

    const displayId = slots[0].displayId;

    const xPositions = findUniquePositions(slots.map(s => s.frame.x), tolerance).sort((a, b) => a - b);
    const yPositions = findUniquePositions(slots.map(s => s.frame.y), tolerance).sort((a, b) => a - b);

    const columns = xPositions.length;
    const rows = yPositions.length;

    const avgWidth = averageGap(xPositions, mean(slots.map(s => s.frame.width)));
    const avgHeight = averageGap(yPositions, mean(slots.map(s => s.frame.height)));

    // Grid must be dense enough to plausibly match the observed windows
    const cells = rows * columns;
    if (cells >= slots.length && cells <= slots.length * 2) {
        logger.info(`Detected grid pattern: ${rows}x${columns} for ${slots.length} windows`);
        return createGridSlotsWithSpacing(xPositions, yPositions, avgWidth, avgHeight, displayId);
    }

    if (!displayBounds) {
        throw new LayoutError(
            LayoutErrorCode.INVALID_GEOMETRY,
            `No bounds for display ${displayId}, cannot build a regular grid`,
            {displayId},
        );
    }
    assertUsableBounds(displayBounds);

    const fallbackColumns = Math.floor(Math.sqrt(slots.length));
    const fallbackRows = Math.ceil(slots.length / fallbackColumns);

    logger.info(`Could not detect clear grid pattern, creating regular ${fallbackRows}x${fallbackColumns} grid`);
    return createRegularGridSlots(fallbackRows, fallbackColumns, displayBounds, displayId);
}

/**
 * Optimize a captured layout into a cleaner grid, display by display
 * Displays are processed in order of first appearance among the slots.
 * With more than one display, slot ids become "<displayId>:<id>".
 */
export function optimizeCapturedLayout(
    capturedLayout: Layout,
    displays: DisplayProvider,
    options: GridInferenceOptions = {},
): Layout {
    logger.info(`Optimizing captured layout with ${capturedLayout.slots.length} slots`);

    const slotsByDisplay = new Map<DisplayId, Slot[]>();
    for (const slot of capturedLayout.slots) {
        const group = slotsByDisplay.get(slot.displayId);
        if (group) {
            group.push(slot);
        } else {
            slotsByDisplay.set(slot.displayId, [slot]);
        }
    }

    // Grids restart at 0_0 on every display, so ids carry the display once there are several
    const prefixIds = slotsByDisplay.size > 1;

    const optimizedSlots: Slot[] = [];
    for (const [displayId, slots] of slotsByDisplay) {
        const displaySlots = inferGridSlots(slots, displays.displayBounds(displayId), options);
        optimizedSlots.push(...(prefixIds
            ? displaySlots.map(slot => ({...slot, id: `${displayId}:${slot.id}`}))
            : displaySlots));
        logger.debug(`Optimized ${slots.length} slots on display ${displayId} to ${displaySlots.length} grid slots`);
    }

    return {
        id: randomUUID(),
        name: `Optimized ${capturedLayout.name}`,
        slots: optimizedSlots,
        matchingStrategy: capturedLayout.matchingStrategy,
    };
}

/**
 * Raw layout with one slot per window at its current frame
 */
export function captureCurrentLayout(windows: readonly ManagedWindow[]): Layout {
    logger.info(`Capturing current layout with ${windows.length} windows`);

    const slots = windows.map((window, index): Slot => ({
        id: `${Math.floor(index / 4)}_${index % 4}`,
        frame: {...window.frame},
        displayId: window.displayId,
        priority: 0,
    }));

    return {
        id: randomUUID(),
        name: 'Captured Layout',
        slots,
        matchingStrategy: 'sequential',
    };
}
