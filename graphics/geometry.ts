import {Matrix} from './math';

export interface Point {
  x: number;
  y: number;
}

/**
Apply the affine transformation [a b c d e f] to a point:
x' = a·x + c·y + e, y' = b·x + d·y + f
*/
export function transformPoint(point: Point, [a, b, c, d, e, f]: Matrix): Point {
  return {
    x: (a * point.x) + (c * point.y) + e,
    y: (b * point.x) + (d * point.y) + f,
  };
}

export interface Size {
  width: number;
  height: number;
}

/**
A4 in points; used wherever a page does not declare a usable MediaBox.
*/
export const defaultPageSize: Size = {width: 595, height: 842};

export interface Rectangle {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function makeRectangle(minX: number, minY: number, maxX: number, maxY: number): Rectangle {
  return {minX, minY, maxX, maxY};
}

/**
Find the Rectangle that contains all of the given points.
*/
export function boundingPoints(...points: Point[]): Rectangle {
  return {
    minX: Math.min(...points.map(({x}) => x)),
    minY: Math.min(...points.map(({y}) => y)),
    maxX: Math.max(...points.map(({x}) => x)),
    maxY: Math.max(...points.map(({y}) => y)),
  };
}

/**
Find the Rectangle that contains all of the given rectangles.
*/
export function boundingRectangle(...rectangles: Rectangle[]): Rectangle {
  return {
    minX: Math.min(...rectangles.map(({minX}) => minX)),
    minY: Math.min(...rectangles.map(({minY}) => minY)),
    maxX: Math.max(...rectangles.map(({maxX}) => maxX)),
    maxY: Math.max(...rectangles.map(({maxY}) => maxY)),
  };
}

export function formatRectangle({minX, minY, maxX, maxY}: Rectangle, digits = 0): string {
  return `[${minX.toFixed(digits)}, ${minY.toFixed(digits)}, ${maxX.toFixed(digits)}, ${maxY.toFixed(digits)}]`;
}
