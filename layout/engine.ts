import {logger} from '../logger';
import {Operation} from '../models';
import {
  pushGraphicsState,
  popGraphicsState,
  rectangle,
  clip,
  endPath,
  drawObject,
} from '../operators';
import {Transform} from '../graphics/math';
import {Rectangle, Size, boundingPoints, boundingRectangle, transformPoint} from '../graphics/geometry';
import {resolveScale, ScaleConstraints} from './scale';
import {PageRange} from './selection';
import {LayoutStrategy, PagePlacement} from './strategies';

export interface ClipBounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
Everything the layout engine needs to know about one embed call.
*/
export interface LayoutRequest extends ScaleConstraints {
  x: number;
  y: number;
  layout: LayoutStrategy;
  /** Degrees, counter-clockwise */
  rotation: number;
  opacity: number;
  clipBounds?: ClipBounds;
  pageRange: PageRange;
}

/**
Compute a placement for each selected page, in selection order.

`pageSizes` is indexed by source page index; every entry of `pages` must
have one.
*/
export function computePlacements(pageSizes: Size[], pages: number[], request: LayoutRequest): PagePlacement[] {
  const {layout} = request;
  const placements: PagePlacement[] = [];
  pages.forEach((pageIndex, ordinal) => {
    const page = pageSizes[pageIndex];
    if (page === undefined) {
      throw new Error(`Page ${pageIndex} not found (source has ${pageSizes.length} pages)`);
    }
    const [scaleX, scaleY] = layout.scale ? layout.scale(ordinal) : resolveScale(page, request);
    const scaled = {width: page.width * scaleX, height: page.height * scaleY};
    const offset = layout.offset({ordinal, pageIndex, page, scaled, previous: placements.slice()});
    const placement: PagePlacement = {
      pageIndex,
      x: request.x + offset.x,
      y: request.y + offset.y,
      scaleX,
      scaleY,
      width: scaled.width,
      height: scaled.height,
    };
    logger.debug(`placing page ${pageIndex} (${layout.name}) at ${placement.x},${placement.y} scale ${scaleX}x${scaleY}`);
    placements.push(placement);
  });
  return placements;
}

export function placementTransform({x, y, scaleX, scaleY}: PagePlacement, rotation: number): Transform {
  return Transform.full(x, y, scaleX, scaleY, rotation);
}

/**
`q`, `cm`, `/name Do`, `Q` for a single placed page.
*/
export function placementOperations(placement: PagePlacement, xObjectName: string, rotation = 0): Operation[] {
  return [
    pushGraphicsState(),
    placementTransform(placement, rotation).toOperation(),
    drawObject(xObjectName),
    popGraphicsState(),
  ];
}

/**
Clipping wraps a whole sequence of placements: [q x y w h re W n] before and
[Q] after.
*/
export function clipOperations({x, y, width, height}: ClipBounds): [Operation[], Operation[]] {
  return [
    [pushGraphicsState(), rectangle(x, y, width, height), clip(), endPath()],
    [popGraphicsState()],
  ];
}

/**
Emit the operations for every placement, paired by position with
`xObjectNames`.
*/
export function layoutOperations(placements: PagePlacement[], xObjectNames: string[], request: LayoutRequest): Operation[] {
  if (request.opacity < 1) {
    // an ExtGState would be needed to paint with opacity
    logger.debug(`opacity ${request.opacity} recorded; pages are drawn opaque`);
  }
  const body = placements.flatMap((placement, index) => {
    return placementOperations(placement, xObjectNames[index], request.rotation);
  });
  if (request.clipBounds === undefined) {
    return body;
  }
  const [before, after] = clipOperations(request.clipBounds);
  return [...before, ...body, ...after];
}

/**
The axis-aligned rectangle covered by a placed page once rotated about its
lower-left corner.
*/
export function placementBounds(placement: PagePlacement, rotation = 0): Rectangle {
  const matrix = Transform.full(placement.x, placement.y, 1, 1, rotation).toMatrix();
  const {width, height} = placement;
  return boundingPoints(
    transformPoint({x: 0, y: 0}, matrix),
    transformPoint({x: width, y: 0}, matrix),
    transformPoint({x: 0, y: height}, matrix),
    transformPoint({x: width, y: height}, matrix),
  );
}

/**
The rectangle covered by all of the placements, or undefined when nothing
was placed.
*/
export function layoutBounds(placements: PagePlacement[], rotation = 0): Rectangle | undefined {
  if (placements.length === 0) {
    return undefined;
  }
  return boundingRectangle(...placements.map(placement => placementBounds(placement, rotation)));
}
