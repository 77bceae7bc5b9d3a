import {PDFDict, PDFDocument, PDFName, PDFRef} from 'pdf-lib';

import {logger} from '../logger';
import {Operation, encodeContent} from '../models';
import * as operators from '../operators';
import {Transform} from '../graphics/math';
import {Size} from '../graphics/geometry';
import {circlePath} from '../graphics/paths';
import {addResource} from '../resources';
import {CustomPattern, CustomPatternBuilder, RGB, customOperations} from './custom';
import {BuiltinHatchStyle, cellMultipliers, styleDrawers} from './styles';

export type HatchStyle = BuiltinHatchStyle | CustomPattern;

export interface HatchSettings {
  style: HatchStyle;
  /** Distance between lines or elements, in points */
  spacing: number;
  lineWidth: number;
  color: RGB;
  /** Cell background; transparent when unset */
  background?: RGB;
  /** Degrees */
  angle: number;
  scale: number;
}

// a cell needs a finite, positive size
function positiveOr(value: number, fallback: number, field: string): number {
  if (Number.isFinite(value) && value > 0) {
    return value;
  }
  logger.warning(`Hatch ${field} must be a positive number, not ${value}; using ${fallback}`);
  return fallback;
}

/**
Immutable hatch settings; every `with*` method returns a new HatchConfig.
*/
export class HatchConfig implements HatchSettings {
  readonly style: HatchStyle = 'diagonal-right';
  readonly spacing: number = 5;
  readonly lineWidth: number = 0.5;
  readonly color: RGB = [0, 0, 0];
  readonly background?: RGB;
  readonly angle: number = 0;
  readonly scale: number = 1;

  constructor(fields: Partial<HatchSettings> = {}) {
    Object.assign(this, fields);
    this.spacing = positiveOr(this.spacing, 5, 'spacing');
    this.scale = positiveOr(this.scale, 1, 'scale');
  }

  static of(style: HatchStyle): HatchConfig {
    return new HatchConfig({style});
  }

  private copy(fields: Partial<HatchSettings>): HatchConfig {
    const {style, spacing, lineWidth, color, background, angle, scale} = this;
    return new HatchConfig({style, spacing, lineWidth, color, background, angle, scale, ...fields});
  }

  withSpacing(spacing: number): HatchConfig {
    return this.copy({spacing});
  }

  withLineWidth(lineWidth: number): HatchConfig {
    return this.copy({lineWidth});
  }

  withColor(r: number, g: number, b: number): HatchConfig {
    return this.copy({color: [r, g, b]});
  }

  withBackground(r: number, g: number, b: number): HatchConfig {
    return this.copy({background: [r, g, b]});
  }

  withAngle(angle: number): HatchConfig {
    return this.copy({angle});
  }

  withScale(scale: number): HatchConfig {
    return this.copy({scale});
  }
}

/**
The size of one pattern cell: spacing·scale, stretched per style.
*/
export function patternCellSize({style, spacing, scale}: HatchSettings): Size {
  const base = spacing * scale;
  const [widthFactor, heightFactor] = typeof style === 'string' && cellMultipliers[style] || [1, 1];
  return {width: base * widthFactor, height: base * heightFactor};
}

/**
The content of one pattern cell: the background (when set), then either the
custom operations or the style's paths drawn with the configured line width,
colour, and angle.
*/
export function patternOperations(config: HatchSettings, width: number, height: number): Operation[] {
  const operations: Operation[] = [];
  if (config.background !== undefined) {
    operations.push(
      operators.setFillColorRgb(...config.background),
      operators.rectangle(0, 0, width, height),
      operators.fill(),
    );
  }
  if (typeof config.style !== 'string') {
    return [...operations, ...customOperations(config.style, width, height)];
  }
  operations.push(
    operators.setLineWidth(config.lineWidth),
    operators.setStrokeColorRgb(...config.color),
    operators.setFillColorRgb(...config.color),
  );
  if (config.angle !== 0) {
    operations.push(new Transform(1, 1, config.angle).toOperation());
  }
  return [...operations, ...styleDrawers[config.style](width, height, config.spacing)];
}

export interface CreatedPattern {
  ref: PDFRef;
  /** Name (P1, P2, ...) to register in the page resources and use with scn */
  name: string;
}

/**
Creates tiling patterns (PDF32000_2008.pdf:8.7.3.1) and hands out unique
pattern names.
*/
export class HatchingManager {
  private patternCounter = 0;

  createPattern(document: PDFDocument, config: HatchSettings): CreatedPattern {
    const {width, height} = patternCellSize(config);
    return this.registerPattern(document, patternOperations(config, width, height), width, height);
  }

  /**
  Create a pattern whose cell content is drawn by `build` on a fresh
  CustomPatternBuilder.
  */
  createCustomPattern(document: PDFDocument,
                      width: number,
                      height: number,
                      build: (builder: CustomPatternBuilder) => void): CreatedPattern {
    const builder = new CustomPatternBuilder();
    build(builder);
    return this.registerPattern(document, builder.build(), width, height);
  }

  addPatternToResources(resources: PDFDict, name: string, ref: PDFRef): void {
    addResource(resources, 'Pattern', name, ref);
  }

  private registerPattern(document: PDFDocument, operations: Operation[], width: number, height: number): CreatedPattern {
    const name = `P${++this.patternCounter}`;
    const {context} = document;
    const stream = context.stream(encodeContent(operations), {
      Type: 'Pattern',
      PatternType: 1, // tiling
      PaintType: 1, // coloured
      TilingType: 1, // constant spacing
      BBox: [0, 0, width, height],
      XStep: width,
      YStep: height,
      Resources: {},
    });
    logger.debug(`pattern ${name}: ${width}x${height} cell, ${operations.length} operations`);
    return {ref: context.register(stream), name};
  }
}

export const PatternOperations = {
  setPatternFillColorSpace: () => operators.setFillColorSpace('Pattern'),
  setPatternStrokeColorSpace: () => operators.setStrokeColorSpace('Pattern'),
  setFillPattern: (name: string) => operators.setFillColorN(PDFName.of(name)),
  setStrokePattern: (name: string) => operators.setStrokeColorN(PDFName.of(name)),
};

/**
Shapes filled with a named pattern: each shape selects the Pattern colour
space and the pattern, then fills its path.
*/
export class PatternedShapeBuilder {
  private operations: Operation[] = [];

  rectangle(x: number, y: number, width: number, height: number, patternName: string): this {
    return this.fillWith(patternName, [operators.rectangle(x, y, width, height)]);
  }

  circle(cx: number, cy: number, r: number, patternName: string): this {
    return this.fillWith(patternName, circlePath(cx, cy, r));
  }

  triangle(x1: number, y1: number, x2: number, y2: number, x3: number, y3: number, patternName: string): this {
    return this.fillWith(patternName, [
      operators.moveTo(x1, y1),
      operators.lineTo(x2, y2),
      operators.lineTo(x3, y3),
      operators.closePath(),
    ]);
  }

  build(): Operation[] {
    return this.operations.slice();
  }

  private fillWith(patternName: string, path: Operation[]): this {
    this.operations.push(
      PatternOperations.setPatternFillColorSpace(),
      PatternOperations.setFillPattern(patternName),
      ...path,
      operators.fill(),
    );
    return this;
  }
}
