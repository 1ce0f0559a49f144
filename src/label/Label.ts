import log from '../logger';
import type { BarcodeEncoder, RenderBackend } from '../backend/types';
import { requirePositive, requirePresent } from '../errors';
import { drawElement, scaleElement } from './elements';
import type { LabelElement, PixelBuffer } from './types';

export interface LabelServices {
    backend: RenderBackend;
    encoder: BarcodeEncoder;
    background?: string;
}

export type PixelSink = (pixels: PixelBuffer) => void;

export const DEFAULT_BACKGROUND = '#FFFFFF';

/**
 * Fixed-size canvas plus an ordered element list. Insertion order is paint order:
 * later elements cover earlier ones.
 */
export class Label {
    private readonly items: LabelElement[] = [];
    private _width: number;
    private _height: number;
    readonly services: LabelServices;

    constructor(width: number, height: number, services: LabelServices) {
        requirePositive(width, 'Label width');
        requirePositive(height, 'Label height');
        this._width = width;
        this._height = height;
        this.services = services;
    }

    get width(): number {
        return this._width;
    }

    get height(): number {
        return this._height;
    }

    get elements(): readonly LabelElement[] {
        return this.items;
    }

    get background(): string {
        return this.services.background ?? DEFAULT_BACKGROUND;
    }

    addElement(element: LabelElement): void {
        this.items.push(requirePresent(element, 'Element'));
    }

    /** Scales the canvas and every element together. */
    scale(factor: number): void {
        requirePositive(factor, 'Scale factor');
        this._width *= factor;
        this._height *= factor;
        for (const element of this.items) {
            scaleElement(element, factor);
        }
    }

    /**
     * Paints every element onto a fresh canvas and hands the pixels to `sink`.
     * An element that fails to draw aborts the whole render.
     */
    render(sink: PixelSink, context?: unknown): void {
        const width = Math.max(1, Math.trunc(this._width));
        const height = Math.max(1, Math.trunc(this._height));
        const target = this.services.backend.newCanvas(width, height);
        target.surface.fill(this.background);

        const env = { surface: target.surface, barcodes: this.services.encoder, context };
        for (const element of this.items) {
            drawElement(element, env);
        }

        log.debug(`[Label] Rendered ${this.items.length} elements onto ${width}x${height}`);
        sink(target.pixels());
    }
}
