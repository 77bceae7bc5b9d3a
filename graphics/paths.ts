import {Operation} from '../models';
import {moveTo, lineTo, curveTo, closePath} from '../operators';

/**
Control point distance for approximating a quarter circle with one cubic
Bézier curve: 4/3·(√2 − 1).
*/
export const KAPPA = 0.5522848;

/**
A closed-by-construction circle path (four Bézier segments, starting and
ending at the 0° point). Does not paint.
*/
export function circlePath(cx: number, cy: number, r: number): Operation[] {
  const k = KAPPA * r;
  return [
    moveTo(cx + r, cy),
    curveTo(cx + r, cy + k, cx + k, cy + r, cx, cy + r),
    curveTo(cx - k, cy + r, cx - r, cy + k, cx - r, cy),
    curveTo(cx - r, cy - k, cx - k, cy - r, cx, cy - r),
    curveTo(cx + k, cy - r, cx + r, cy - k, cx + r, cy),
  ];
}

/**
A rough arc from startAngle to endAngle (radians) as a single Bézier
segment; only close to circular for spans up to about π/2, which is enough
for decorative fills.
*/
export function arcPath(cx: number, cy: number, r: number, startAngle: number, endAngle: number): Operation[] {
  const startX = cx + r * Math.cos(startAngle);
  const startY = cy + r * Math.sin(startAngle);
  const endX = cx + r * Math.cos(endAngle);
  const endY = cy + r * Math.sin(endAngle);
  const control = r * KAPPA;
  const midAngle = (startAngle + endAngle) / 2;
  return [
    moveTo(startX, startY),
    curveTo(
      startX + control * Math.cos(midAngle - Math.PI / 2),
      startY + control * Math.sin(midAngle - Math.PI / 2),
      endX + control * Math.cos(midAngle + Math.PI / 2),
      endY + control * Math.sin(midAngle + Math.PI / 2),
      endX,
      endY,
    ),
  ];
}

/**
A closed polygon path through the given points; empty for no points.
*/
export function polygonPath(points: Array<[number, number]>): Operation[] {
  if (points.length === 0) {
    return [];
  }
  const [[firstX, firstY], ...rest] = points;
  return [
    moveTo(firstX, firstY),
    ...rest.map(([x, y]) => lineTo(x, y)),
    closePath(),
  ];
}
