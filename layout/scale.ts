import {Size} from '../graphics/geometry';

export interface ScaleConstraints {
  scaleX: number;
  scaleY: number;
  maxWidth?: number;
  maxHeight?: number;
  preserveAspectRatio: boolean;
}

/**
Fit the requested scale within maxWidth / maxHeight. The width constraint is
applied first, then the height constraint; with preserveAspectRatio each step
copies the clamped axis onto the other. Without constraints the requested
scale passes through unchanged, upscaling included.
*/
export function resolveScale({width, height}: Size, constraints: ScaleConstraints): [number, number] {
  let {scaleX, scaleY} = constraints;
  const {maxWidth, maxHeight, preserveAspectRatio} = constraints;
  if (maxWidth !== undefined) {
    scaleX = Math.min(scaleX, maxWidth / width);
    if (preserveAspectRatio) {
      scaleY = scaleX;
    }
  }
  if (maxHeight !== undefined) {
    scaleY = Math.min(scaleY, maxHeight / height);
    if (preserveAspectRatio) {
      scaleX = scaleY;
    }
  }
  return [scaleX, scaleY];
}
