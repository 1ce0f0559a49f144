import { createCanvas, ImageData } from '@napi-rs/canvas';
import type { PixelBuffer } from '../label/types';

export function encodePng(pixels: PixelBuffer): Buffer {
    const canvas = createCanvas(pixels.width, pixels.height);
    canvas.getContext('2d').putImageData(new ImageData(pixels.data, pixels.width, pixels.height), 0, 0);
    return canvas.encodeSync('png');
}
