import {
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFOperator,
  PDFOperatorNames,
  PDFString,
} from 'pdf-lib';

/**
Anything that may appear before an operator in a content stream. Names,
strings, and hex strings are pdf-lib's own (immutable) objects; PDFName
instances are interned, so `PDFName.of('Fm1') === PDFName.of('Fm1')`.
*/
export type Operand = number | PDFName | PDFString | PDFHexString | Operand[];

const operatorNames = new Set<string>(Object.values(PDFOperatorNames));

export function isOperatorName(name: string): name is PDFOperatorNames {
  return operatorNames.has(name);
}

/**
Render an operand the way it is written in a content stream.
*/
export function formatOperand(operand: Operand): string {
  if (Array.isArray(operand)) {
    return `[${operand.map(formatOperand).join(' ')}]`;
  }
  if (typeof operand === 'number') {
    return PDFNumber.of(operand).toString();
  }
  return operand.toString();
}

/**
A single content stream instruction: an operator and the operands that
precede it, e.g., `10 20 m` is `new Operation('m', [10, 20])`.

Operations stay inspectable until they cross into a pdf-lib document, where
toPDFOperator() converts them.
*/
export class Operation {
  constructor(public operator: string, public operands: Operand[] = []) { }

  static of(operator: string, ...operands: Operand[]): Operation {
    return new Operation(operator, operands);
  }

  toPDFOperator(): PDFOperator {
    const operator = this.operator;
    if (!isOperatorName(operator)) {
      throw new Error(`Unsupported content stream operator: "${operator}"`);
    }
    const args = this.operands.map(operand => {
      if (typeof operand === 'number') {
        return PDFNumber.of(operand);
      }
      if (Array.isArray(operand)) {
        // pdf-lib writes string arguments verbatim
        return formatOperand(operand);
      }
      return operand;
    });
    return PDFOperator.of(operator, args);
  }

  toString(): string {
    return [...this.operands.map(formatOperand), this.operator].join(' ');
  }
}

export function toPDFOperators(operations: Operation[]): PDFOperator[] {
  return operations.map(operation => operation.toPDFOperator());
}

/**
Serialize operations as content stream text, one operation per line.
*/
export function encodeContent(operations: Operation[]): Buffer {
  return Buffer.from(operations.map(operation => `${operation}\n`).join(''), 'binary');
}

/**
Escape the characters that are significant inside a literal `( ... )` string
(PDF32000_2008.pdf:7.3.4.2).
*/
export function escapeLiteralString(text: string): string {
  return text.replace(/([\\()])/g, '\\$1');
}

export function literalString(text: string): PDFString {
  return PDFString.of(escapeLiteralString(text));
}
