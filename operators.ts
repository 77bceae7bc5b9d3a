import {PDFName} from 'pdf-lib';

import {Operation, Operand, literalString} from './models';

// Special graphics state (PDF32000_2008.pdf:8.4.4, Table 57)

export const pushGraphicsState = () => Operation.of('q');
export const popGraphicsState = () => Operation.of('Q');

export function concatMatrix(a: number, b: number, c: number, d: number, e: number, f: number): Operation {
  return Operation.of('cm', a, b, c, d, e, f);
}

// General graphics state

export const setLineWidth = (width: number) => Operation.of('w', width);

export function setDashPattern(dashArray: number[], dashPhase: number): Operation {
  return Operation.of('d', dashArray, dashPhase);
}

// Path construction and painting (8.5.2, 8.5.3)

export const moveTo = (x: number, y: number) => Operation.of('m', x, y);
export const lineTo = (x: number, y: number) => Operation.of('l', x, y);

export function curveTo(x1: number, y1: number, x2: number, y2: number, x3: number, y3: number): Operation {
  return Operation.of('c', x1, y1, x2, y2, x3, y3);
}

export const closePath = () => Operation.of('h');

export function rectangle(x: number, y: number, width: number, height: number): Operation {
  return Operation.of('re', x, y, width, height);
}

export const stroke = () => Operation.of('S');
export const fill = () => Operation.of('f');
export const fillAndStroke = () => Operation.of('B');
export const endPath = () => Operation.of('n');
export const clip = () => Operation.of('W');

// Colour (8.6.8)

export const setStrokeColorRgb = (r: number, g: number, b: number) => Operation.of('RG', r, g, b);
export const setFillColorRgb = (r: number, g: number, b: number) => Operation.of('rg', r, g, b);
export const setFillColorGray = (gray: number) => Operation.of('g', gray);
export const setFillColorSpace = (name: string) => Operation.of('cs', PDFName.of(name));
export const setStrokeColorSpace = (name: string) => Operation.of('CS', PDFName.of(name));
export const setFillColorN = (...operands: Operand[]) => Operation.of('scn', ...operands);
export const setStrokeColorN = (...operands: Operand[]) => Operation.of('SCN', ...operands);

// XObjects (8.8)

export const drawObject = (name: string) => Operation.of('Do', PDFName.of(name));

// Text (9.4)

export const beginText = () => Operation.of('BT');
export const endText = () => Operation.of('ET');
export const setFont = (name: string, size: number) => Operation.of('Tf', PDFName.of(name), size);
export const moveText = (x: number, y: number) => Operation.of('Td', x, y);
export const showText = (text: string) => Operation.of('Tj', literalString(text));

// Marked content (14.6)

export function beginMarkedContent(tag: string, properties: string): Operation {
  return Operation.of('BDC', PDFName.of(tag), PDFName.of(properties));
}

export const endMarkedContent = () => Operation.of('EMC');
