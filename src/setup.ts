import { CanvasRenderBackend } from './backend/CanvasRenderBackend';
import { BwipBarcodeEncoder } from './backend/BwipBarcodeEncoder';
import type { LabelConfig } from './config';
import type { BuilderOptions } from './label/LabelBuilder';

/** Builder options from a loaded config, with the configured font directory registered. */
export function createBuilderOptions(config: LabelConfig): Required<BuilderOptions> {
    const backend = new CanvasRenderBackend();
    if (config.fontDirectory) {
        backend.registerFonts(config.fontDirectory);
    }
    return {
        backend,
        encoder: new BwipBarcodeEncoder(),
        margin: config.margin,
        background: config.background,
    };
}
