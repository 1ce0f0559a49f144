/**
 * CanvasRenderBackend: Skia rendering through @napi-rs/canvas.
 *
 * Text is measured on a 1x1 scratch canvas owned by the backend, so measuring never
 * touches a label being rendered. Rasters (images, barcode symbols) are staged on
 * their own canvas and stretched into the target rectangle with drawImage, which
 * keeps the current rotation in effect.
 */

import fs from 'fs';
import path from 'path';
import { createCanvas, GlobalFonts, ImageData, loadImage, type SKRSContext2D } from '@napi-rs/canvas';
import log from '../logger';
import type { FontSpec, PixelBuffer, Raster } from '../label/types';
import type { DrawingSurface, RenderBackend, RenderTarget } from './types';

const FONT_EXTENSIONS = new Set(['.ttf', '.otf', '.ttc', '.woff', '.woff2']);

export function cssFont(font: FontSpec, size: number): string {
    const style = font.style ?? 'normal';
    const weight = font.weight ?? 'normal';
    return `${style} ${weight} ${size}px "${font.family}", "Arial", sans-serif`;
}

function toCanvasSource(raster: Raster) {
    const staging = createCanvas(raster.width, raster.height);
    staging.getContext('2d').putImageData(new ImageData(raster.data, raster.width, raster.height), 0, 0);
    return staging;
}

class CanvasSurface implements DrawingSurface {
    constructor(private readonly ctx: SKRSContext2D, private readonly width: number, private readonly height: number) {}

    save(): void {
        this.ctx.save();
    }

    restore(): void {
        this.ctx.restore();
    }

    rotate(degrees: number, pivotX: number, pivotY: number): void {
        this.ctx.translate(pivotX, pivotY);
        this.ctx.rotate((degrees * Math.PI) / 180);
        this.ctx.translate(-pivotX, -pivotY);
    }

    fill(color: string): void {
        this.ctx.fillStyle = color;
        this.ctx.fillRect(0, 0, this.width, this.height);
    }

    drawText(text: string, x: number, y: number, font: FontSpec, size: number, color: string): void {
        this.ctx.font = cssFont(font, size);
        this.ctx.fillStyle = color;
        this.ctx.textBaseline = 'top';
        this.ctx.textAlign = 'left';
        this.ctx.fillText(text, x, y);
    }

    drawRaster(raster: Raster, x: number, y: number, width: number, height: number): void {
        this.ctx.drawImage(toCanvasSource(raster), x, y, width, height);
    }
}

export class CanvasRenderBackend implements RenderBackend {
    private readonly scratch = createCanvas(1, 1).getContext('2d');

    measureTextWidth(text: string, font: FontSpec, size: number): number {
        if (!text) return 0;
        this.scratch.font = cssFont(font, size);
        return this.scratch.measureText(text).width;
    }

    newCanvas(width: number, height: number): RenderTarget {
        const canvas = createCanvas(width, height);
        const ctx = canvas.getContext('2d');
        return {
            surface: new CanvasSurface(ctx, width, height),
            pixels(): PixelBuffer {
                const image = ctx.getImageData(0, 0, width, height);
                return { width, height, data: new Uint8ClampedArray(image.data) };
            },
        };
    }

    /** Registers one font file, under `family` when given, else under its embedded name. */
    registerFont(fontPath: string, family?: string): boolean {
        const registered = GlobalFonts.registerFromPath(fontPath, family);
        if (registered) {
            log.info(`[CanvasRenderBackend] Registered font ${family ? `"${family}" ` : ''}from ${fontPath}`);
        } else {
            log.warn(`[CanvasRenderBackend] Could not register font file ${fontPath}`);
        }
        return registered;
    }

    /** Registers every font file found directly inside `directory`; returns how many loaded. */
    registerFonts(directory: string): number {
        if (!fs.existsSync(directory)) {
            log.warn(`[CanvasRenderBackend] Font directory not found: ${directory}`);
            return 0;
        }

        let count = 0;
        for (const entry of fs.readdirSync(directory)) {
            if (!FONT_EXTENSIONS.has(path.extname(entry).toLowerCase())) continue;
            if (this.registerFont(path.join(directory, entry))) count++;
        }
        return count;
    }
}

/** Decodes PNG/JPEG/WebP/SVG bytes into an owned RGBA raster for image elements. */
export async function decodeImage(bytes: Buffer): Promise<Raster> {
    const image = await loadImage(bytes);
    const canvas = createCanvas(image.width, image.height);
    const ctx = canvas.getContext('2d');
    ctx.drawImage(image, 0, 0);
    const data = ctx.getImageData(0, 0, image.width, image.height);
    return { width: image.width, height: image.height, data: new Uint8ClampedArray(data.data) };
}
