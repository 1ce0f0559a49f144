import { describe, expect, it } from 'vitest';

import { BwipBarcodeEncoder } from '../../src/backend/BwipBarcodeEncoder';
import { CanvasRenderBackend, cssFont, decodeImage } from '../../src/backend/CanvasRenderBackend';
import { BarcodeEncodingError } from '../../src/errors';
import { Label } from '../../src/label/Label';
import { LabelBuilder } from '../../src/label/LabelBuilder';
import type { PixelBuffer } from '../../src/label/types';
import { encodePng } from '../../src/printer/png';

function renderToBuffer(label: Label): PixelBuffer {
    let result: PixelBuffer | undefined;
    label.render(pixels => {
        result = pixels;
    });
    if (!result) throw new Error('sink was not called');
    return result;
}

function pixelAt(pixels: PixelBuffer, x: number, y: number): number[] {
    const i = (y * pixels.width + x) * 4;
    return Array.from(pixels.data.subarray(i, i + 4));
}

describe('CanvasRenderBackend', () => {
    const services = () => ({ backend: new CanvasRenderBackend(), encoder: new BwipBarcodeEncoder() });

    it('renders an empty label as a white buffer of the label size', () => {
        const pixels = renderToBuffer(new Label(7, 3, services()));
        expect([pixels.width, pixels.height]).toEqual([7, 3]);
        expect(pixels.data.length).toBe(7 * 3 * 4);
        expect(pixels.data.every(v => v === 255)).toBe(true);
    });

    it('measures empty text as zero width', () => {
        expect(new CanvasRenderBackend().measureTextWidth('', { family: 'Arial' }, 12)).toBe(0);
    });

    it('builds CSS font strings', () => {
        expect(cssFont({ family: 'Inter', weight: 'bold' }, 14)).toBe('normal bold 14px "Inter", "Arial", sans-serif');
    });

    it('paints image rasters into their rectangle', () => {
        const black = { width: 1, height: 1, data: new Uint8ClampedArray([0, 0, 0, 255]) };
        const label = new LabelBuilder(20, 10, services()).addImage(black, 0, 0, 4, 4, 'none').build();
        const pixels = renderToBuffer(label);
        expect(pixelAt(pixels, 1, 1)).toEqual([0, 0, 0, 255]);
        expect(pixelAt(pixels, 10, 8)).toEqual([255, 255, 255, 255]);
    });

    it('survives a PNG round trip', async () => {
        const pixels = renderToBuffer(new Label(4, 2, services()));
        const png = encodePng(pixels);
        expect(Array.from(png.subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);

        const decoded = await decodeImage(png);
        expect([decoded.width, decoded.height]).toEqual([4, 2]);
        expect(pixelAt(decoded, 3, 1)).toEqual([255, 255, 255, 255]);
    });
});

describe('BwipBarcodeEncoder', () => {
    const encoder = new BwipBarcodeEncoder();

    it('produces a raster of exactly the requested size', () => {
        const raster = encoder.encode('12345678', 'CODE_128', 120.4, 30.6);
        expect([raster.width, raster.height]).toEqual([120, 31]);
        expect(raster.data.length).toBe(120 * 31 * 4);
        expect(raster.data.some((v, i) => i % 4 === 0 && v < 128)).toBe(true);
    });

    it('raises a distinct error for payloads the symbology cannot hold', () => {
        expect(() => encoder.encode('ABC', 'EAN_13', 100, 40)).toThrow(BarcodeEncodingError);
        expect(() => encoder.encode('', 'CODE_128', 100, 40)).toThrow(BarcodeEncodingError);
    });

    it('propagates encoder failures out of generate', () => {
        const builder = new LabelBuilder(200, 60, {
            backend: new CanvasRenderBackend(),
            encoder,
        }).addBarcode('NOT-A-NUMBER', 0, 0, 150, 40, 'left', 0, 'EAN_13');
        expect(() => builder.generate(() => undefined)).toThrow(BarcodeEncodingError);
    });

    it('leaves the area outside the barcode white', () => {
        const label = new LabelBuilder(200, 60, {
            backend: new CanvasRenderBackend(),
            encoder,
        })
            .addBarcode('LC-2041', 0, 0, 180, 40, 'center')
            .build();
        const pixels = renderToBuffer(label);

        expect(pixelAt(pixels, 100, 55)).toEqual([255, 255, 255, 255]);
    });
});
