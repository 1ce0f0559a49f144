export type Alignment = 'left' | 'center' | 'right' | 'none';

export interface FontSpec {
    family: string;
    weight?: 'normal' | 'bold';
    style?: 'normal' | 'italic';
}

/** RGBA pixels, row-major, 4 bytes per pixel. */
export interface Raster {
    width: number;
    height: number;
    data: Uint8ClampedArray;
}

export type PixelBuffer = Raster;

export const SYMBOLOGIES = ['CODE_128', 'CODE_39', 'EAN_13', 'EAN_8', 'UPC_A', 'ITF_14'] as const;
export type Symbology = typeof SYMBOLOGIES[number];

/**
 * Context test used by decision chains and conditional elements.
 * `accepts` is the single type check against the untyped context; `evaluate`
 * only ever sees contexts that passed it.
 */
export interface Condition<T> {
    /** Used to persist conditional elements; unnamed conditions cannot be serialized. */
    readonly name?: string;
    accepts(context: unknown): context is T;
    evaluate(context: T): boolean;
}

interface Positioned {
    x: number;
    y: number;
    rotation: number; // degrees, about (x, y)
}

export interface TextElement extends Positioned {
    kind: 'text';
    text: string;
    font: FontSpec;
    size: number;
    color: string;
    cachedWidth?: number; // cleared by scale
}

export interface ImageElement extends Positioned {
    kind: 'image';
    image: Raster;
    width: number;
    height: number;
}

export interface BarcodeElement extends Positioned {
    kind: 'barcode';
    code: string;
    symbology: Symbology;
    width: number;
    height: number;
}

export interface ConditionalElement extends Positioned {
    kind: 'conditional';
    inner: LabelElement;
    condition: Condition<unknown>;
}

export type LabelElement = TextElement | ImageElement | BarcodeElement | ConditionalElement;
export type ElementKind = LabelElement['kind'];
export type ElementOfKind<K extends ElementKind> = Extract<LabelElement, { kind: K }>;
