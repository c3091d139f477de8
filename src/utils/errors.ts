/**
 * Error types raised by the layout core
 *
 * LayoutError marks a caller contract violation (bad geometry, empty layout,
 * unknown strategy). PlatformError marks an environment failure the
 * surrounding app must surface to the user (missing permission, no displays).
 * Per-window move failures are never thrown; they are reported in results.
 */

export const LayoutErrorCode = {
    INVALID_GEOMETRY: 'INVALID_GEOMETRY',
    EMPTY_LAYOUT: 'EMPTY_LAYOUT',
    UNKNOWN_STRATEGY: 'UNKNOWN_STRATEGY',
} as const;

export type LayoutErrorCodeType = typeof LayoutErrorCode[keyof typeof LayoutErrorCode];

export const PlatformErrorCode = {
    PERMISSION_DENIED: 'PERMISSION_DENIED',
    NO_DISPLAYS: 'NO_DISPLAYS',
} as const;

export type PlatformErrorCodeType = typeof PlatformErrorCode[keyof typeof PlatformErrorCode];

export class LayoutError extends Error {
    readonly code: LayoutErrorCodeType;
    readonly context?: Record<string, unknown>;

    constructor(code: LayoutErrorCodeType, message: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'LayoutError';
        this.code = code;
        this.context = context;
    }
}

export class PlatformError extends Error {
    readonly code: PlatformErrorCodeType;
    readonly context?: Record<string, unknown>;

    constructor(code: PlatformErrorCodeType, message: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'PlatformError';
        this.code = code;
        this.context = context;
    }
}

/**
 * Narrow an unknown thrown value to a PlatformError with the given code
 */
export function isPlatformError(error: unknown, code?: PlatformErrorCodeType): error is PlatformError {
    return error instanceof PlatformError && (code === undefined || error.code === code);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
