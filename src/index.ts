export { LabelBuilder, DecisionChain, DEFAULT_MARGIN } from './label/LabelBuilder';
export type { BuilderOptions, Configure } from './label/LabelBuilder';
export { Label, DEFAULT_BACKGROUND } from './label/Label';
export type { LabelServices, PixelSink } from './label/Label';
export {
    createText,
    createImage,
    createBarcode,
    createConditional,
    drawElement,
    scaleElement,
    measuredWidth,
    measuredHeight,
    moveElement,
} from './label/elements';
export type { DrawEnv, ElementHandler } from './label/elements';
export { splitText } from './label/splitText';
export { defineCondition, instanceOf } from './label/conditions';
export type { ContextGuard } from './label/conditions';
export { serializeLabel, deserializeLabel, FORMAT_VERSION } from './label/serialization';
export type { SerializeOptions, DeserializeOptions } from './label/serialization';
export { SYMBOLOGIES } from './label/types';
export type {
    Alignment,
    BarcodeElement,
    Condition,
    ConditionalElement,
    ElementKind,
    FontSpec,
    ImageElement,
    LabelElement,
    PixelBuffer,
    Raster,
    Symbology,
    TextElement,
} from './label/types';

export { CanvasRenderBackend, decodeImage, cssFont } from './backend/CanvasRenderBackend';
export { BwipBarcodeEncoder } from './backend/BwipBarcodeEncoder';
export type { BarcodeEncoder, DrawingSurface, RenderBackend, RenderTarget, TextMeasurer } from './backend/types';

export { encodePng } from './printer/png';

export { loadConfig, resolveConfig, DEFAULT_CONFIG, CONFIG_ENV_VAR } from './config';
export type { LabelConfig, LogLevelOption } from './config';
export { createBuilderOptions } from './setup';
export { configureLogging } from './logger';
export { LabelError, InvalidArgumentError, BarcodeEncodingError, LabelFormatError } from './errors';
