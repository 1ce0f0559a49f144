import type { FontSpec, PixelBuffer, Raster, Symbology } from '../label/types';

export interface TextMeasurer {
    measureTextWidth(text: string, font: FontSpec, size: number): number;
}

/**
 * Drawing operations the elements need. Rotation is always bracketed by
 * save()/restore() so it never leaks into the next element.
 */
export interface DrawingSurface {
    save(): void;
    restore(): void;
    rotate(degrees: number, pivotX: number, pivotY: number): void;
    fill(color: string): void;
    drawText(text: string, x: number, y: number, font: FontSpec, size: number, color: string): void;
    drawRaster(raster: Raster, x: number, y: number, width: number, height: number): void;
}

export interface RenderTarget {
    readonly surface: DrawingSurface;
    pixels(): PixelBuffer;
}

export interface RenderBackend extends TextMeasurer {
    newCanvas(width: number, height: number): RenderTarget;
}

export interface BarcodeEncoder {
    /** Produces a raster of the requested size; throws BarcodeEncodingError on bad payloads. */
    encode(payload: string, symbology: Symbology, width: number, height: number): Raster;
}
