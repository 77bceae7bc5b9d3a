import {Point, Size} from '../graphics/geometry';

/**
Where one selected source page lands on the target: its lower-left corner,
the scale applied to it, and the resulting (scaled) size.
*/
export interface PagePlacement {
  pageIndex: number;
  x: number;
  y: number;
  scaleX: number;
  scaleY: number;
  width: number;
  height: number;
}

export interface PlacementContext {
  /** Position of the page within the selection (0 for the first selected page) */
  ordinal: number;
  pageIndex: number;
  /** Unscaled page size */
  page: Size;
  /** Page size after scaling */
  scaled: Size;
  /** Placements already computed for the pages before this one */
  previous: PagePlacement[];
}

/**
A layout strategy decides which of the selected pages are placed and where
each lands relative to the base position.
*/
export interface LayoutStrategy {
  readonly name: string;
  filterPages(pages: number[], totalPages: number): number[];
  offset(context: PlacementContext): Point;
  /**
  When present, replaces the scale resolver (and the max size constraints)
  for this strategy.
  */
  scale?(ordinal: number): [number, number];
}

export class FirstPageOnly implements LayoutStrategy {
  readonly name = 'first-page-only';
  filterPages(pages: number[]): number[] {
    return pages.slice(0, 1);
  }
  offset(): Point {
    return {x: 0, y: 0};
  }
}

export class SpecificPage implements LayoutStrategy {
  readonly name = 'specific-page';
  constructor(public pageIndex: number) { }
  filterPages(_pages: number[], totalPages: number): number[] {
    return this.pageIndex < totalPages ? [this.pageIndex] : [];
  }
  offset(): Point {
    return {x: 0, y: 0};
  }
}

/**
Pages run downward from the base position, each below the previous one.
*/
export class VerticalStack implements LayoutStrategy {
  readonly name = 'vertical';
  constructor(public gap = 0) { }
  filterPages(pages: number[]): number[] {
    return pages;
  }
  offset({previous}: PlacementContext): Point {
    const total = previous.reduce((sum, {height}) => sum + height + this.gap, 0);
    return {x: 0, y: -total};
  }
}

/**
Pages run rightward from the base position.
*/
export class HorizontalStack implements LayoutStrategy {
  readonly name = 'horizontal';
  constructor(public gap = 0) { }
  filterPages(pages: number[]): number[] {
    return pages;
  }
  offset({previous}: PlacementContext): Point {
    const total = previous.reduce((sum, {width}) => sum + width + this.gap, 0);
    return {x: total, y: 0};
  }
}

export enum GridFillOrder {
  RowFirst,
  ColumnFirst,
}

/**
Cells are sized by the current page's scaled size, so pages of mixed sizes
do not line up.

With ColumnFirst, `columns` bounds the number of rows: the page at ordinal
i goes to row `i % columns` and column `⌊i / columns⌋`.
*/
export class GridLayout implements LayoutStrategy {
  readonly name = 'grid';
  constructor(public columns: number,
              public gapX = 0,
              public gapY = 0,
              public fillOrder = GridFillOrder.RowFirst) {
    if (!Number.isInteger(columns) || columns < 1) {
      throw new Error(`Grid columns must be a positive integer; got ${columns}`);
    }
  }
  filterPages(pages: number[]): number[] {
    return pages;
  }
  cell(ordinal: number): {row: number, column: number} {
    const major = Math.floor(ordinal / this.columns);
    const minor = ordinal % this.columns;
    return this.fillOrder === GridFillOrder.RowFirst ?
      {row: major, column: minor} :
      {row: minor, column: major};
  }
  offset({ordinal, scaled}: PlacementContext): Point {
    const {row, column} = this.cell(ordinal);
    return {
      x: column * (scaled.width + this.gapX),
      y: -row * (scaled.height + this.gapY),
    };
  }
}

export type PositionFunction = (ordinal: number, pageWidth: number, pageHeight: number) => [number, number];
export type ScaleFunction = (ordinal: number) => [number, number];

/**
Caller-supplied placement: positionFn gives the offset from the base
position (from the unscaled page size) and scaleFn the scale, which is used
as-is.
*/
export class CustomLayout implements LayoutStrategy {
  readonly name = 'custom';
  constructor(private positionFn: PositionFunction,
              private scaleFn: ScaleFunction) { }
  filterPages(pages: number[]): number[] {
    return pages;
  }
  offset({ordinal, page}: PlacementContext): Point {
    const [x, y] = this.positionFn(ordinal, page.width, page.height);
    return {x, y};
  }
  scale(ordinal: number): [number, number] {
    return this.scaleFn(ordinal);
  }
}
