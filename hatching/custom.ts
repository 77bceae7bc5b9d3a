import {Operation} from '../models';
import * as operators from '../operators';
import {Transform} from '../graphics/math';
import {circlePath, polygonPath} from '../graphics/paths';

export type RGB = [number, number, number];

/**
Named numbers, colours and strings handed to a parametric pattern drawer.
*/
export class PatternParams {
  data = new Map<string, number>();
  colors: RGB[] = [[0, 0, 0]];
  strings = new Map<string, string>();

  withParam(key: string, value: number): this {
    this.data.set(key, value);
    return this;
  }

  withColor(r: number, g: number, b: number): this {
    this.colors.push([r, g, b]);
    return this;
  }

  withString(key: string, value: string): this {
    this.strings.set(key, value);
    return this;
  }

  /** 0 for missing keys */
  get(key: string): number {
    const value = this.data.get(key);
    return value === undefined ? 0 : value;
  }
}

/**
Decides, for each cell of a procedural pattern, whether the cell is drawn.
`t` runs from 0 at the cell grid's origin toward 1 at its far corner.
*/
export interface PatternSampler {
  sample(x: number, y: number, t: number): boolean;
}

export interface ProceduralPattern {
  sampler: PatternSampler;
  /** Cells per side */
  resolution: number;
  /** Draw hits as filled squares; otherwise as small filled circles */
  fill: boolean;
}

export interface PatternElement {
  operations: Operation[];
  /** When set, the element is drawn inside `q cm ... Q` */
  transform?: Transform;
}

export type SimpleDrawer = (width: number, height: number) => Operation[];
export type ParametricDrawer = (width: number, height: number, params: PatternParams) => Operation[];

export type CustomPattern =
  {kind: 'simple', draw: SimpleDrawer} |
  {kind: 'parametric', draw: ParametricDrawer, params: PatternParams} |
  {kind: 'procedural', pattern: ProceduralPattern} |
  {kind: 'composite', elements: PatternElement[]};

/**
Draw the cells of a resolution × resolution grid (with square cells of
min(width, height) / resolution) that the sampler accepts.
*/
export function proceduralOperations({sampler, resolution, fill}: ProceduralPattern, width: number, height: number): Operation[] {
  const step = Math.min(width, height) / resolution;
  const operations: Operation[] = [];
  for (let i = 0; i < resolution; i++) {
    for (let j = 0; j < resolution; j++) {
      const x = i * step;
      const y = j * step;
      if (sampler.sample(x, y, (i / resolution + j / resolution) / 2)) {
        if (fill) {
          operations.push(operators.rectangle(x, y, step, step));
        }
        else {
          operations.push(...circlePath(x + step / 2, y + step / 2, step * 0.3));
        }
        operations.push(operators.fill());
      }
    }
  }
  return operations;
}

export function compositeOperations(elements: PatternElement[]): Operation[] {
  return elements.flatMap(({operations, transform}) => {
    if (transform === undefined) {
      return operations;
    }
    return [operators.pushGraphicsState(), transform.toOperation(), ...operations, operators.popGraphicsState()];
  });
}

export function customOperations(custom: CustomPattern, width: number, height: number): Operation[] {
  switch (custom.kind) {
    case 'simple':
      return custom.draw(width, height);
    case 'parametric':
      return custom.draw(width, height, custom.params);
    case 'procedural':
      return proceduralOperations(custom.pattern, width, height);
    case 'composite':
      return compositeOperations(custom.elements);
  }
}

/**
Fluent builder for the content of a custom pattern cell.

Path segments are held back until the path is painted (stroke, fill, or
fillStroke); style and transform operations are emitted immediately.
*/
export class CustomPatternBuilder {
  private operations: Operation[] = [];
  private currentPath: Operation[] = [];
  private transformDepth = 0;

  moveTo(x: number, y: number): this {
    this.currentPath.push(operators.moveTo(x, y));
    return this;
  }

  lineTo(x: number, y: number): this {
    this.currentPath.push(operators.lineTo(x, y));
    return this;
  }

  curveTo(cx1: number, cy1: number, cx2: number, cy2: number, x: number, y: number): this {
    this.currentPath.push(operators.curveTo(cx1, cy1, cx2, cy2, x, y));
    return this;
  }

  closePath(): this {
    this.currentPath.push(operators.closePath());
    return this;
  }

  rectangle(x: number, y: number, width: number, height: number): this {
    this.currentPath.push(operators.rectangle(x, y, width, height));
    return this;
  }

  circle(cx: number, cy: number, r: number): this {
    this.currentPath.push(...circlePath(cx, cy, r), operators.closePath());
    return this;
  }

  polygon(points: Array<[number, number]>): this {
    this.currentPath.push(...polygonPath(points));
    return this;
  }

  stroke(): this {
    return this.paint(operators.stroke());
  }

  fill(): this {
    return this.paint(operators.fill());
  }

  fillStroke(): this {
    return this.paint(operators.fillAndStroke());
  }

  setLineWidth(width: number): this {
    this.operations.push(operators.setLineWidth(width));
    return this;
  }

  setStrokeColor(r: number, g: number, b: number): this {
    this.operations.push(operators.setStrokeColorRgb(r, g, b));
    return this;
  }

  setFillColor(r: number, g: number, b: number): this {
    this.operations.push(operators.setFillColorRgb(r, g, b));
    return this;
  }

  setDashPattern(pattern: number[], phase: number): this {
    this.operations.push(operators.setDashPattern(pattern, phase));
    return this;
  }

  pushTransform(transform: Transform): this {
    this.operations.push(operators.pushGraphicsState(), transform.toOperation());
    this.transformDepth++;
    return this;
  }

  /** A no-op when no transform is pushed */
  popTransform(): this {
    if (this.transformDepth > 0) {
      this.transformDepth--;
      this.operations.push(operators.popGraphicsState());
    }
    return this;
  }

  addOperation(operation: Operation): this {
    this.operations.push(operation);
    return this;
  }

  addOperations(operations: Operation[]): this {
    this.operations.push(...operations);
    return this;
  }

  /**
  The accumulated operations; an unpainted path is appended as-is.
  */
  build(): Operation[] {
    this.flushPath();
    return this.operations.slice();
  }

  private paint(operation: Operation): this {
    this.flushPath();
    this.operations.push(operation);
    return this;
  }

  private flushPath(): void {
    this.operations.push(...this.currentPath);
    this.currentPath = [];
  }
}
