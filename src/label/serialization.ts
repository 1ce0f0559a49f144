import type { BarcodeEncoder, RenderBackend } from '../backend/types';
import { CanvasRenderBackend } from '../backend/CanvasRenderBackend';
import { BwipBarcodeEncoder } from '../backend/BwipBarcodeEncoder';
import { InvalidArgumentError, LabelFormatError } from '../errors';
import { createBarcode, createConditional, createImage, createText } from './elements';
import { Label } from './Label';
import { SYMBOLOGIES, type Condition, type FontSpec, type LabelElement, type Raster, type Symbology } from './types';

export const FORMAT_VERSION = 1;

export interface SerializeOptions {
    /** JSON indentation; 0 for a single line. */
    indent?: number;
}

export interface DeserializeOptions {
    /** Conditions for conditional elements, looked up by Condition.name. */
    conditions?: Record<string, Condition<unknown>>;
    backend?: RenderBackend;
    encoder?: BarcodeEncoder;
}

// ── Writing ──────────────────────────────────────────────────────────

function rasterToJson(raster: Raster) {
    return {
        width: raster.width,
        height: raster.height,
        rgba: Buffer.from(raster.data.buffer, raster.data.byteOffset, raster.data.byteLength).toString('base64'),
    };
}

function elementToJson(el: LabelElement): Record<string, unknown> {
    const base = { kind: el.kind, x: el.x, y: el.y, rotation: el.rotation };
    switch (el.kind) {
        case 'text':
            return { ...base, text: el.text, font: { ...el.font }, size: el.size, color: el.color };
        case 'image':
            return { ...base, width: el.width, height: el.height, image: rasterToJson(el.image) };
        case 'barcode':
            return { ...base, code: el.code, symbology: el.symbology, width: el.width, height: el.height };
        case 'conditional':
            if (!el.condition.name) {
                throw new InvalidArgumentError('Conditional elements need a named condition to be serialized');
            }
            return { ...base, condition: el.condition.name, element: elementToJson(el.inner) };
    }
}

export function serializeLabel(label: Label, options: SerializeOptions = {}): string {
    const doc = {
        version: FORMAT_VERSION,
        width: label.width,
        height: label.height,
        background: label.background,
        elements: label.elements.map(elementToJson),
    };
    return JSON.stringify(doc, null, options.indent ?? 2);
}

// ── Reading ──────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, where: string): Record<string, unknown> {
    if (!isRecord(value)) throw new LabelFormatError(`${where} must be an object`);
    return value;
}

function num(obj: Record<string, unknown>, key: string, where: string): number {
    const value = obj[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new LabelFormatError(`${where}.${key} must be a number`);
    }
    return value;
}

function str(obj: Record<string, unknown>, key: string, where: string): string {
    const value = obj[key];
    if (typeof value !== 'string') throw new LabelFormatError(`${where}.${key} must be a string`);
    return value;
}

function isSymbology(value: unknown): value is Symbology {
    return SYMBOLOGIES.some(s => s === value);
}

function readFont(value: unknown, where: string): FontSpec {
    const obj = record(value, where);
    const font: FontSpec = { family: str(obj, 'family', where) };
    const { weight, style } = obj;
    if (weight !== undefined) {
        if (weight !== 'normal' && weight !== 'bold') throw new LabelFormatError(`${where}.weight is not a font weight`);
        font.weight = weight;
    }
    if (style !== undefined) {
        if (style !== 'normal' && style !== 'italic') throw new LabelFormatError(`${where}.style is not a font style`);
        font.style = style;
    }
    return font;
}

function readRaster(value: unknown, where: string): Raster {
    const obj = record(value, where);
    const width = num(obj, 'width', where);
    const height = num(obj, 'height', where);
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new LabelFormatError(`${where} must have positive integer dimensions, got ${width}x${height}`);
    }
    const bytes = Buffer.from(str(obj, 'rgba', where), 'base64');
    if (bytes.length !== width * height * 4) {
        throw new LabelFormatError(`${where}.rgba holds ${bytes.length} bytes, expected ${width * height * 4}`);
    }
    return { width, height, data: new Uint8ClampedArray(bytes) };
}

function readElement(value: unknown, where: string, conditions: Record<string, Condition<unknown>>): LabelElement {
    const obj = record(value, where);
    const kind = str(obj, 'kind', where);
    const x = num(obj, 'x', where);
    const y = num(obj, 'y', where);
    const rotation = obj.rotation === undefined ? 0 : num(obj, 'rotation', where);

    switch (kind) {
        case 'text':
            return createText(str(obj, 'text', where), x, y, readFont(obj.font, `${where}.font`), num(obj, 'size', where), str(obj, 'color', where), rotation);
        case 'image':
            return createImage(readRaster(obj.image, `${where}.image`), x, y, num(obj, 'width', where), num(obj, 'height', where), rotation);
        case 'barcode': {
            const symbology = obj.symbology ?? 'CODE_128';
            if (!isSymbology(symbology)) throw new LabelFormatError(`${where}.symbology is not supported: ${String(symbology)}`);
            return createBarcode(str(obj, 'code', where), x, y, num(obj, 'width', where), num(obj, 'height', where), rotation, symbology);
        }
        case 'conditional': {
            const name = str(obj, 'condition', where);
            const condition = Object.hasOwn(conditions, name) ? conditions[name] : undefined;
            if (!condition) throw new InvalidArgumentError(`Unknown condition "${name}" at ${where}`);
            return createConditional(readElement(obj.element, `${where}.element`, conditions), condition);
        }
        default:
            throw new LabelFormatError(`${where}.kind is not an element kind: ${kind}`);
    }
}

export function deserializeLabel(json: string, options: DeserializeOptions = {}): Label {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (e) {
        throw new LabelFormatError('Label document is not valid JSON', { cause: e });
    }

    const doc = record(parsed, 'label');
    if (doc.version !== FORMAT_VERSION) {
        throw new LabelFormatError(`Unsupported label format version: ${String(doc.version)}`);
    }
    const elements: unknown = doc.elements;
    if (!Array.isArray(elements)) throw new LabelFormatError('label.elements must be an array');
    const background = doc.background;
    if (background !== undefined && typeof background !== 'string') {
        throw new LabelFormatError('label.background must be a string');
    }

    const label = new Label(num(doc, 'width', 'label'), num(doc, 'height', 'label'), {
        backend: options.backend ?? new CanvasRenderBackend(),
        encoder: options.encoder ?? new BwipBarcodeEncoder(),
        background,
    });

    const conditions = options.conditions ?? {};
    elements.forEach((element: unknown, i: number) => {
        label.addElement(readElement(element, `label.elements[${i}]`, conditions));
    });
    return label;
}
