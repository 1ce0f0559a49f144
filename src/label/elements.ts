import type { BarcodeEncoder, DrawingSurface, TextMeasurer } from '../backend/types';
import { requirePositive, requirePresent } from '../errors';
import type {
    BarcodeElement,
    Condition,
    ConditionalElement,
    ElementKind,
    ElementOfKind,
    FontSpec,
    ImageElement,
    LabelElement,
    Raster,
    Symbology,
    TextElement,
} from './types';

export interface DrawEnv {
    surface: DrawingSurface;
    barcodes: BarcodeEncoder;
    context: unknown;
}

/**
 * Per-kind operations. `draw` paints in label coordinates; rotation is applied
 * around it by drawElement.
 */
export interface ElementHandler<E extends LabelElement> {
    draw(el: E, env: DrawEnv): void;
    scale(el: E, factor: number): void;
    measuredHeight(el: E): number;
    measuredWidth(el: E, measurer: TextMeasurer): number;
    moveTo(el: E, x: number, y: number): void;
}

type HandlerTable = { [K in ElementKind]: ElementHandler<ElementOfKind<K>> };

// ── Constructors ─────────────────────────────────────────────────────

export function createText(
    text: string | null | undefined,
    x: number,
    y: number,
    font: FontSpec,
    size: number,
    color: string,
    rotation: number = 0
): TextElement {
    return {
        kind: 'text',
        text: text ?? '',
        x,
        y,
        rotation,
        font: { ...requirePresent(font, 'Font') },
        size,
        color,
    };
}

export function createImage(
    image: Raster | null | undefined,
    x: number,
    y: number,
    width: number,
    height: number,
    rotation: number = 0
): ImageElement {
    return { kind: 'image', image: requirePresent(image, 'Image'), x, y, width, height, rotation };
}

export function createBarcode(
    code: string | null | undefined,
    x: number,
    y: number,
    width: number,
    height: number,
    rotation: number = 0,
    symbology: Symbology = 'CODE_128'
): BarcodeElement {
    return { kind: 'barcode', code: code ?? '', symbology, x, y, width, height, rotation };
}

/** Wraps `inner` so it is only drawn for contexts the condition accepts and holds for. */
export function createConditional<T>(
    inner: LabelElement | null | undefined,
    condition: Condition<T> | null | undefined
): ConditionalElement {
    const element = requirePresent(inner, 'Conditional element');
    return {
        kind: 'conditional',
        inner: element,
        condition: requirePresent(condition, 'Condition'),
        x: element.x,
        y: element.y,
        rotation: 0,
    };
}

// ── Handlers ─────────────────────────────────────────────────────────

const textHandler: ElementHandler<TextElement> = {
    draw(el, env) {
        if (!el.text) return;
        env.surface.drawText(el.text, el.x, el.y, el.font, el.size, el.color);
    },
    scale(el, factor) {
        el.x *= factor;
        el.y *= factor;
        el.size *= factor;
        el.cachedWidth = undefined;
    },
    measuredHeight: el => el.size,
    measuredWidth(el, measurer) {
        if (el.cachedWidth === undefined) {
            el.cachedWidth = measurer.measureTextWidth(el.text, el.font, el.size);
        }
        return el.cachedWidth;
    },
    moveTo(el, x, y) {
        el.x = x;
        el.y = y;
    },
};

// Images and barcodes share rectangle geometry
function scaleRect(el: ImageElement | BarcodeElement, factor: number): void {
    el.x *= factor;
    el.y *= factor;
    el.width *= factor;
    el.height *= factor;
}

const imageHandler: ElementHandler<ImageElement> = {
    draw(el, env) {
        env.surface.drawRaster(el.image, el.x, el.y, el.width, el.height);
    },
    scale: scaleRect,
    measuredHeight: el => el.height,
    measuredWidth: el => el.width,
    moveTo(el, x, y) {
        el.x = x;
        el.y = y;
    },
};

const barcodeHandler: ElementHandler<BarcodeElement> = {
    draw(el, env) {
        // Generated on every draw so scaled geometry is always honoured
        const symbol = env.barcodes.encode(el.code, el.symbology, el.width, el.height);
        env.surface.drawRaster(symbol, el.x, el.y, el.width, el.height);
    },
    scale: scaleRect,
    measuredHeight: el => el.height,
    measuredWidth: el => el.width,
    moveTo(el, x, y) {
        el.x = x;
        el.y = y;
    },
};

const conditionalHandler: ElementHandler<ConditionalElement> = {
    draw(el, env) {
        const { condition, inner } = el;
        if (condition.accepts(env.context) && condition.evaluate(env.context)) {
            drawElement(inner, env);
        }
    },
    scale(el, factor) {
        el.x *= factor;
        el.y *= factor;
        scaleElement(el.inner, factor);
    },
    measuredHeight: el => measuredHeight(el.inner),
    measuredWidth: (el, measurer) => measuredWidth(el.inner, measurer),
    moveTo(el, x, y) {
        el.x = x;
        el.y = y;
        moveElement(el.inner, x, y);
    },
};

const HANDLERS: HandlerTable = {
    text: textHandler,
    image: imageHandler,
    barcode: barcodeHandler,
    conditional: conditionalHandler,
};

function visit<R>(el: LabelElement, visitor: <E extends LabelElement>(handler: ElementHandler<E>, el: E) => R): R {
    switch (el.kind) {
        case 'text':
            return visitor(HANDLERS.text, el);
        case 'image':
            return visitor(HANDLERS.image, el);
        case 'barcode':
            return visitor(HANDLERS.barcode, el);
        case 'conditional':
            return visitor(HANDLERS.conditional, el);
    }
}

// ── Capability contract ──────────────────────────────────────────────

export function drawElement(el: LabelElement, env: DrawEnv): void {
    env.surface.save();
    if (el.rotation) {
        env.surface.rotate(el.rotation, el.x, el.y);
    }
    visit(el, (handler, e) => handler.draw(e, env));
    env.surface.restore();
}

/** Multiplies position, size and size-derived state by `factor` and drops cached measurements. */
export function scaleElement(el: LabelElement, factor: number): void {
    requirePositive(factor, 'Scale factor');
    visit(el, (handler, e) => handler.scale(e, factor));
}

export function measuredHeight(el: LabelElement): number {
    return visit(el, (handler, e) => handler.measuredHeight(e));
}

export function measuredWidth(el: LabelElement, measurer: TextMeasurer): number {
    return visit(el, (handler, e) => handler.measuredWidth(e, measurer));
}

export function moveElement(el: LabelElement, x: number, y: number): void {
    visit(el, (handler, e) => handler.moveTo(e, x, y));
}
