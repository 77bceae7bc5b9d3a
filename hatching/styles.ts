import {Operation} from '../models';
import {moveTo, lineTo, curveTo, closePath, rectangle, stroke, fill} from '../operators';
import {arcPath, circlePath} from '../graphics/paths';

export type BuiltinHatchStyle =
  'diagonal-right' |
  'diagonal-left' |
  'horizontal' |
  'vertical' |
  'cross' |
  'diagonal-cross' |
  'dots' |
  'checkerboard' |
  'brick' |
  'hexagonal' |
  'wave' |
  'zigzag' |
  'circles' |
  'triangles' |
  'diamond' |
  'scales' |
  'spiral' |
  'dotted-grid' |
  'concentric-circles' |
  'wood-grain';

/**
Pattern cell size as multiples of spacing·scale; styles not listed use a
square cell of 1 × 1.
*/
export const cellMultipliers: {[style: string]: [number, number]} = {
  'checkerboard': [2, 2],
  'brick': [4, 2],
  'hexagonal': [3, 2.6],
  'circles': [2, 2],
  'concentric-circles': [2, 2],
  'diamond': [2, 2],
  'scales': [2, 2],
  'triangles': [2, 1.73],
  'wave': [4, 2],
  'zigzag': [4, 1],
  'spiral': [4, 4],
  'wood-grain': [8, 2],
};

type StyleDrawer = (width: number, height: number, spacing: number) => Operation[];

const diagonalRight: StyleDrawer = (width, height) => [
  moveTo(0, 0), lineTo(width, height), stroke(),
];

const diagonalLeft: StyleDrawer = (width, height) => [
  moveTo(0, height), lineTo(width, 0), stroke(),
];

const horizontal: StyleDrawer = (width, height) => [
  moveTo(0, height / 2), lineTo(width, height / 2), stroke(),
];

const vertical: StyleDrawer = (width, height) => [
  moveTo(width / 2, 0), lineTo(width / 2, height), stroke(),
];

const cross: StyleDrawer = (width, height, spacing) => [
  ...horizontal(width, height, spacing),
  ...vertical(width, height, spacing),
];

/**
Draw the path of each style within a width × height cell. Colours and line
width are set by the caller.
*/
export const styleDrawers: {[S in BuiltinHatchStyle]: StyleDrawer} = {
  'diagonal-right': diagonalRight,
  'diagonal-left': diagonalLeft,
  'horizontal': horizontal,
  'vertical': vertical,
  'cross': cross,
  'diagonal-cross': (width, height, spacing) => [
    ...diagonalRight(width, height, spacing),
    ...diagonalLeft(width, height, spacing),
  ],
  // the dot size follows the unscaled spacing
  'dots': (width, height, spacing) => [
    ...circlePath(width / 2, height / 2, spacing * 0.2), fill(),
  ],
  'checkerboard': (width, height) => [
    rectangle(0, 0, width / 2, height / 2),
    rectangle(width / 2, height / 2, width / 2, height / 2),
    fill(),
  ],
  'brick': (width, height) => [
    moveTo(0, height / 2), lineTo(width, height / 2), stroke(),
    moveTo(width / 4, 0), lineTo(width / 4, height / 2), stroke(),
    moveTo(width * 3 / 4, height / 2), lineTo(width * 3 / 4, height), stroke(),
  ],
  'hexagonal': (width, height) => {
    const cx = width / 2;
    const cy = height / 2;
    const r = width / 3;
    const operations = [moveTo(cx + r, cy)];
    for (let i = 1; i <= 6; i++) {
      const angle = i * Math.PI / 3;
      operations.push(lineTo(cx + r * Math.cos(angle), cy + r * Math.sin(angle)));
    }
    return [...operations, stroke()];
  },
  'wave': (width, height) => [
    moveTo(0, height / 2),
    curveTo(width / 4, 0, width * 3 / 4, height, width, height / 2),
    stroke(),
  ],
  'zigzag': (width, height) => [
    moveTo(0, height / 2),
    lineTo(width / 4, 0),
    lineTo(width / 2, height),
    lineTo(width * 3 / 4, 0),
    lineTo(width, height / 2),
    stroke(),
  ],
  'circles': (width, height) => [
    ...circlePath(width / 2, height / 2, Math.min(width, height) * 0.3), stroke(),
  ],
  'triangles': (width, height) => [
    moveTo(width / 2, 0), lineTo(0, height), lineTo(width, height), closePath(), stroke(),
  ],
  'diamond': (width, height) => [
    moveTo(width / 2, 0),
    lineTo(width, height / 2),
    lineTo(width / 2, height),
    lineTo(0, height / 2),
    closePath(),
    stroke(),
  ],
  'scales': (width, height) => [
    ...arcPath(width / 2, height, width / 2, 0, Math.PI), stroke(),
  ],
  'spiral': (width, height) => {
    const cx = width / 2;
    const cy = height / 2;
    const steps = 20;
    const maxRadius = Math.min(width, height) / 2;
    const operations = [moveTo(cx, cy)];
    for (let i = 1; i <= steps; i++) {
      const t = i / steps;
      const angle = t * 2 * Math.PI;
      operations.push(lineTo(cx + t * maxRadius * Math.cos(angle), cy + t * maxRadius * Math.sin(angle)));
    }
    return [...operations, stroke()];
  },
  'dotted-grid': (width, height, spacing) => [
    ...cross(width, height, spacing),
    ...circlePath(width / 2, height / 2, Math.min(width, height) * 0.1), fill(),
  ],
  'concentric-circles': (width, height) => {
    const maxRadius = Math.min(width, height) / 2;
    return [1, 2, 3].flatMap(i => [...circlePath(width / 2, height / 2, maxRadius * i / 3), stroke()]);
  },
  'wood-grain': (width, height) => [0, 1, 2].flatMap(i => {
    const y = height * (i + 0.5) / 3;
    return [
      moveTo(0, y),
      curveTo(width * 0.2, y - height * 0.1, width * 0.8, y + height * 0.1, width, y),
      stroke(),
    ];
  }),
};

export const builtinHatchStyles: readonly BuiltinHatchStyle[] = Object.keys(styleDrawers).filter(isBuiltinHatchStyle);

export function isBuiltinHatchStyle(style: string): style is BuiltinHatchStyle {
  return Object.prototype.hasOwnProperty.call(styleDrawers, style);
}
