import log from '../logger';
import type { BarcodeEncoder, RenderBackend } from '../backend/types';
import { CanvasRenderBackend } from '../backend/CanvasRenderBackend';
import { BwipBarcodeEncoder } from '../backend/BwipBarcodeEncoder';
import { requirePositive, requirePresent } from '../errors';
import {
    createBarcode,
    createConditional,
    createImage,
    createText,
    measuredHeight,
    measuredWidth,
    moveElement,
} from './elements';
import { Label, type PixelSink } from './Label';
import { splitText } from './splitText';
import type { Alignment, Condition, FontSpec, LabelElement, Raster, Symbology } from './types';

export const DEFAULT_MARGIN = 5;

export interface BuilderOptions {
    backend?: RenderBackend;
    encoder?: BarcodeEncoder;
    margin?: number;
    background?: string;
}

export type Configure = (builder: LabelBuilder) => void;

/**
 * One if / elseIf / else chain. The fired flag belongs to the chain, so chains
 * started inside a branch never affect the chain that contains them.
 */
export class DecisionChain {
    private fired = false;

    constructor(private readonly builder: LabelBuilder, condition: Condition<unknown>, configure: Configure) {
        this.attempt(condition, configure);
    }

    private attempt<T>(condition: Condition<T>, configure: Configure): this {
        requirePresent(condition, 'Condition');
        const context = this.builder.context;
        if (!this.fired && condition.accepts(context) && condition.evaluate(context)) {
            this.fired = true;
            configure(this.builder);
        }
        return this;
    }

    elseIf<T>(condition: Condition<T>, configure: Configure): this {
        return this.attempt(condition, configure);
    }

    else(configure: Configure): LabelBuilder {
        if (!this.fired) {
            this.fired = true;
            configure(this.builder);
        }
        return this.builder;
    }

    end(): LabelBuilder {
        return this.builder;
    }
}

/**
 * Fluent composition of a Label. Every added element is aligned, clamped into the
 * canvas and folded into the running bottom edge (lastY).
 */
export class LabelBuilder {
    private readonly label: Label;
    private readonly backend: RenderBackend;
    private readonly margin: number;
    private ctx: unknown = undefined;
    private maxY = 0;
    private readonly wrappers: Condition<unknown>[] = [];

    constructor(width: number, height: number, options: BuilderOptions = {}) {
        this.backend = options.backend ?? new CanvasRenderBackend();
        this.margin = options.margin ?? DEFAULT_MARGIN;
        this.label = new Label(width, height, {
            backend: this.backend,
            encoder: options.encoder ?? new BwipBarcodeEncoder(),
            background: options.background,
        });
    }

    get context(): unknown {
        return this.ctx;
    }

    withContext<T extends object>(context: T): this {
        this.ctx = context;
        return this;
    }

    // ── Elements ─────────────────────────────────────────────────────

    addText(
        text: string | null | undefined,
        x: number,
        y: number,
        font: FontSpec,
        size: number,
        color: string,
        alignment: Alignment = 'left',
        rotation: number = 0
    ): this {
        this.place(createText(text, x, y, font, size, color, rotation), alignment);
        return this;
    }

    addBarcode(
        code: string | null | undefined,
        x: number,
        y: number,
        width: number,
        height: number,
        alignment: Alignment = 'left',
        rotation: number = 0,
        symbology: Symbology = 'CODE_128'
    ): this {
        this.place(createBarcode(code, x, y, width, height, rotation, symbology), alignment);
        return this;
    }

    addImage(
        image: Raster,
        x: number,
        y: number,
        width: number,
        height: number,
        alignment: Alignment = 'left',
        rotation: number = 0
    ): this {
        this.place(createImage(image, x, y, width, height, rotation), alignment);
        return this;
    }

    /** Adds `text` as fixed-width lines of `maxLength` characters, `lineSpacing` apart. */
    addSplitText(
        text: string | null | undefined,
        x: number,
        y: number,
        font: FontSpec,
        size: number,
        maxLength: number,
        lineSpacing: number,
        color: string,
        alignment: Alignment = 'left'
    ): this {
        requirePresent(font, 'Font');
        const lines = splitText(text, maxLength);
        lines.forEach((line, i) => {
            this.place(createText(line, x, y + i * lineSpacing, font, size, color), alignment);
        });
        return this;
    }

    private place(element: LabelElement, alignment: Alignment): void {
        let placed = element;
        for (let i = this.wrappers.length - 1; i >= 0; i--) {
            placed = createConditional(placed, this.wrappers[i]);
        }

        const labelWidth = this.label.width;
        const labelHeight = this.label.height;
        const width = measuredWidth(placed, this.backend);
        const height = measuredHeight(placed);

        let x = placed.x;
        switch (alignment) {
            case 'left':
                x = this.margin;
                break;
            case 'center':
                x = (labelWidth - width) / 2;
                break;
            case 'right':
                x = labelWidth - width - this.margin;
                break;
        }

        let y = placed.y;
        if (x < 0) x = 0;
        if (y < 0) y = 0;
        if (x + width > labelWidth) x = labelWidth - width;
        if (y + height > labelHeight) y = labelHeight - height;

        moveElement(placed, x, y);
        this.label.addElement(placed);
        this.maxY = Math.max(this.maxY, y + height);

        log.debug(`[LabelBuilder] Placed ${element.kind} at (${x}, ${y}) w=${width} h=${height} align=${alignment}`);
    }

    // ── Composition ──────────────────────────────────────────────────

    /** Starts a decision chain evaluated against the bound context. */
    if<T>(condition: Condition<T>, configure: Configure): DecisionChain {
        return new DecisionChain(this, condition, configure);
    }

    for(start: number, end: number, configure: (builder: LabelBuilder, index: number) => void): this {
        for (let i = start; i < end; i++) {
            configure(this, i);
        }
        return this;
    }

    forEach<T>(items: Iterable<T> | null | undefined, configure: (builder: LabelBuilder, item: T) => void): this {
        for (const item of requirePresent(items, 'Items')) {
            configure(this, item);
        }
        return this;
    }

    /**
     * Elements added inside `configure` are drawn only when the render-time context
     * satisfies `condition`.
     */
    when<T>(condition: Condition<T>, configure: Configure): this {
        this.wrappers.push(requirePresent(condition, 'Condition'));
        try {
            configure(this);
        } finally {
            this.wrappers.pop();
        }
        return this;
    }

    // ── Scaling & layout ─────────────────────────────────────────────

    scale(factor: number): this {
        requirePositive(factor, 'Scale factor');
        this.label.scale(factor);
        this.maxY *= factor;
        return this;
    }

    /** Uniform scale so the label fits inside targetWidth x targetHeight. */
    scaleToFit(targetWidth: number, targetHeight: number): this {
        requirePositive(targetWidth, 'Target width');
        requirePositive(targetHeight, 'Target height');
        const factor = Math.min(targetWidth / this.label.width, targetHeight / this.label.height);
        return this.scale(factor);
    }

    /** Shifts all elements so the occupied band [0, lastY] sits in the middle of the label. */
    centerVertically(): this {
        const elements = this.label.elements;
        if (elements.length === 0) return this;

        const offset = (this.label.height - this.maxY) / 2;
        for (const element of elements) {
            moveElement(element, element.x, element.y + offset);
        }
        this.maxY += offset;
        return this;
    }

    lastY(): number {
        return this.maxY;
    }

    build(): Label {
        return this.label;
    }

    generate(sink: PixelSink): this {
        this.label.render(sink, this.ctx);
        return this;
    }
}
