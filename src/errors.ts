/**
 * Error taxonomy for label composition.
 *
 * Argument problems are raised at the call that introduced them. Elements that
 * overflow the canvas are clamped by the builder and never reach this file.
 */

export class LabelError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Non-positive dimensions or factors, absent images, conditions, elements or items. */
export class InvalidArgumentError extends LabelError {}

/** The barcode encoder could not represent the payload in the requested symbology. */
export class BarcodeEncodingError extends LabelError {
    readonly payload: string;
    readonly symbology: string;

    constructor(payload: string, symbology: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Cannot encode "${payload}" as ${symbology}: ${reason}`, { cause });
        this.payload = payload;
        this.symbology = symbology;
    }
}

/** A persisted label document is malformed. */
export class LabelFormatError extends LabelError {}

export function requirePositive(value: number, what: string): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new InvalidArgumentError(`${what} must be greater than 0 (got ${value})`);
    }
}

export function requirePresent<T>(value: T | null | undefined, what: string): T {
    if (value === null || value === undefined) {
        throw new InvalidArgumentError(`${what} is required`);
    }
    return value;
}
