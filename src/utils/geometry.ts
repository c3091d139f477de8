/**
 * Rectangle helpers used by detection and layout math
 */

import type {Point, Rect} from '../types/geometry.js';
import {LayoutError, LayoutErrorCode} from './errors.js';

export function rectCenter(frame: Rect): Point {
    return {
        x: frame.x + frame.width / 2,
        y: frame.y + frame.height / 2,
    };
}

/**
 * Half-open containment: left/top edges are inside, right/bottom are not
 */
export function rectContains(frame: Rect, point: Point): boolean {
    return point.x >= frame.x &&
           point.x < frame.x + frame.width &&
           point.y >= frame.y &&
           point.y < frame.y + frame.height;
}

/**
 * Reject display bounds that would produce NaN or empty cells
 * @throws LayoutError with INVALID_GEOMETRY
 */
export function assertUsableBounds(bounds: Rect, what = 'Display bounds'): void {
    const finite = [bounds.x, bounds.y, bounds.width, bounds.height].every(Number.isFinite);
    if (!finite || bounds.width <= 0 || bounds.height <= 0) {
        throw new LayoutError(
            LayoutErrorCode.INVALID_GEOMETRY,
            `${what} must have a positive finite size, got ${bounds.width}x${bounds.height} at (${bounds.x}, ${bounds.y})`,
            {bounds},
        );
    }
}

/**
 * Reject non-positive or fractional grid dimensions
 * @throws LayoutError with INVALID_GEOMETRY
 */
export function assertPositiveCount(value: number, name: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new LayoutError(
            LayoutErrorCode.INVALID_GEOMETRY,
            `${name} must be a positive integer, got ${value}`,
            {[name]: value},
        );
    }
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}
