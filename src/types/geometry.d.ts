/**
 * Geometry primitives shared by detection and layout code
 *
 * Screen coordinates use a top-left origin and are measured in pixels.
 */

export interface Point {
    x: number;
    y: number;
}

export interface Rect {
    x: number;        // Left edge
    y: number;        // Top edge
    width: number;
    height: number;
}

/**
 * Opaque display identifier as reported by the display provider
 */
export type DisplayId = number;
