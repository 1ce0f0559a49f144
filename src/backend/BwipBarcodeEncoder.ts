import bwipjs from 'bwip-js';
import { Resvg } from '@resvg/resvg-js';
import { createCanvas, ImageData } from '@napi-rs/canvas';
import log from '../logger';
import { BarcodeEncodingError } from '../errors';
import type { Raster, Symbology } from '../label/types';
import type { BarcodeEncoder } from './types';

const BCID: Record<Symbology, string> = {
    CODE_128: 'code128',
    CODE_39: 'code39',
    EAN_13: 'ean13',
    EAN_8: 'ean8',
    UPC_A: 'upca',
    ITF_14: 'itf14',
};

/**
 * bwip-js draws the symbol as SVG, resvg rasterizes it at the target width and the
 * result is stretched to the exact target height (bars are vertical, so only the
 * width needs full resolution).
 */
export class BwipBarcodeEncoder implements BarcodeEncoder {
    encode(payload: string, symbology: Symbology, width: number, height: number): Raster {
        const targetWidth = Math.max(1, Math.round(width));
        const targetHeight = Math.max(1, Math.round(height));

        if (!payload) {
            throw new BarcodeEncodingError(payload, symbology, new Error('payload is empty'));
        }

        let svg: string;
        try {
            svg = bwipjs.toSVG({ bcid: BCID[symbology], text: payload, scale: 2, includetext: false });
        } catch (e) {
            log.error(`[BwipBarcodeEncoder] Failed to encode "${payload}" as ${symbology}:`, e);
            throw new BarcodeEncodingError(payload, symbology, e);
        }

        const rendered = new Resvg(svg, {
            fitTo: { mode: 'width', value: targetWidth },
            background: 'white',
        }).render();

        const staging = createCanvas(rendered.width, rendered.height);
        staging
            .getContext('2d')
            .putImageData(new ImageData(new Uint8ClampedArray(rendered.pixels), rendered.width, rendered.height), 0, 0);

        const canvas = createCanvas(targetWidth, targetHeight);
        const ctx = canvas.getContext('2d');
        ctx.imageSmoothingEnabled = false;
        ctx.drawImage(staging, 0, 0, targetWidth, targetHeight);
        const image = ctx.getImageData(0, 0, targetWidth, targetHeight);

        return { width: targetWidth, height: targetHeight, data: new Uint8ClampedArray(image.data) };
    }
}
