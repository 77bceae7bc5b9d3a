import {BufferIterable, BufferIterator} from 'lexing';
import {PDFHexString, PDFName, PDFString} from 'pdf-lib';

import {Operation, Operand} from '../models';

export type Token =
  {kind: 'operand', value: Operand} |
  {kind: 'operator', name: string} |
  {kind: 'arrayStart'} |
  {kind: 'arrayEnd'};

/**
A rule's callback is called with the ContentLexer bound as `this`, so that it
can enter and leave the literal string state. Returning undefined consumes
the match without emitting a token.
*/
export type ContentRule = [RegExp, (this: ContentLexer, match: RegExpMatchArray) => Token | undefined];

const ignore = () => undefined;

function decodeName(encoded: string): string {
  return encoded.replace(/#([0-9A-Fa-f]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

/**
Content stream syntax (PDF32000_2008.pdf:7.8.2), limited to the operands
that appear in page description operators: no dictionaries and no inline
images.
*/
const default_rules: ContentRule[] = [
  [/^\s+/, ignore],
  [/^%[^\r\n]*/, ignore],
  [/^<</, () => {
    throw new Error('Inline dictionaries are not supported in content streams');
  }],
  [/^<([0-9A-Fa-f\s]*)>/, match => ({kind: 'operand', value: PDFHexString.of(match[1].replace(/\s+/g, ''))})],
  [/^\(/, function(match) {
    this.beginLiteral();
    return undefined;
  }],
  [/^\[/, () => ({kind: 'arrayStart'})],
  [/^\]/, () => ({kind: 'arrayEnd'})],
  [/^\/([^\s/\[\]()<>{}%]*)/, match => ({kind: 'operand', value: PDFName.of(decodeName(match[1]))})],
  [/^[+-]?(\d+\.?\d*|\.\d+)/, match => ({kind: 'operand', value: parseFloat(match[0])})],
  [/^(true|false|null)(?![A-Za-z0-9])/, match => {
    throw new Error(`Unsupported content stream operand: ${match[0]}`);
  }],
  [/^ID(?![A-Za-z0-9])/, () => {
    throw new Error('Inline images are not supported in content streams');
  }],
  [/^([A-Za-z][A-Za-z0-9]*\*?|'|")/, match => ({kind: 'operator', name: match[0]})],
];

/**
Inside a literal string (PDF32000_2008.pdf:7.3.4.2) balanced parentheses are
part of the string. Escapes are kept as written, so that re-encoding the
string reproduces its source text.
*/
const literal_rules: ContentRule[] = [
  [/^\\[\s\S]/, function(match) {
    this.literal += match[0];
    return undefined;
  }],
  [/^\(/, function(match) {
    this.states.push('LITERAL');
    this.literal += match[0];
    return undefined;
  }],
  [/^\)/, function(match) {
    this.states.pop();
    if (this.states.length === 0) {
      return {kind: 'operand', value: PDFString.of(this.literal)};
    }
    this.literal += match[0];
    return undefined;
  }],
  [/^[^()\\]+/, function(match) {
    this.literal += match[0];
    return undefined;
  }],
];

/**
Reads tokens from a lexing BufferIterable, peeking `peekLength` bytes at a
time. A match that runs up to the end of the peeked input may continue past
it, so the window is widened and the input matched again.
*/
export class ContentLexer {
  states: string[] = [];
  literal = '';
  /** Offset of the current match from the start of the input */
  matchStart = 0;
  private literalStart = 0;
  private position = 0;

  constructor(private iterable: BufferIterable, private peekLength = 1024) { }

  beginLiteral(): void {
    this.states.push('LITERAL');
    this.literal = '';
    this.literalStart = this.matchStart;
  }

  /**
  Return the next token, or undefined once the input is exhausted.
  */
  next(): Token | undefined {
    while (true) {
      const input = this.iterable.peek(this.peekLength).toString('binary');
      if (input.length === 0) {
        if (this.states.length > 0) {
          throw new Error(`Unterminated literal string at position ${this.literalStart}`);
        }
        return undefined;
      }
      const rules = this.states.length > 0 ? literal_rules : default_rules;
      const matched = matchRule(rules, input);
      const truncated = input.length === this.peekLength;
      if (truncated && (matched === undefined || matched[1][0].length === input.length)) {
        this.peekLength *= 2;
        continue;
      }
      if (matched === undefined) {
        throw new Error(`Invalid content stream syntax at position ${this.position}: "${input.slice(0, 32)}"`);
      }
      const [[, callback], match] = matched;
      this.matchStart = this.position;
      this.iterable.skip(match[0].length);
      this.position += match[0].length;
      const token = callback.call(this, match);
      if (token !== undefined) {
        return token;
      }
    }
  }
}

function matchRule(rules: ContentRule[], input: string): [ContentRule, RegExpMatchArray] | undefined {
  for (const rule of rules) {
    const match = input.match(rule[0]);
    if (match !== null) {
      return [rule, match];
    }
  }
  return undefined;
}

/**
Split content stream input into tokens.
*/
export function* tokenize(iterable: BufferIterable): IterableIterator<Token> {
  const lexer = new ContentLexer(iterable);
  let token = lexer.next();
  while (token !== undefined) {
    yield token;
    token = lexer.next();
  }
}

/**
Parse content stream bytes (already decoded from any filters) into
operations.
*/
export function decodeContent(content: Uint8Array | string): Operation[] {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'binary') : Buffer.from(content);
  const operations: Operation[] = [];
  // the bottom of the stack collects operands for the next operator;
  // each '[' opens another level
  const stack: Operand[][] = [[]];
  for (const token of tokenize(new BufferIterator(buffer, 0))) {
    const top = stack[stack.length - 1];
    if (token.kind === 'operand') {
      top.push(token.value);
    }
    else if (token.kind === 'arrayStart') {
      stack.push([]);
    }
    else if (token.kind === 'arrayEnd') {
      const array = stack.pop();
      if (stack.length === 0 || array === undefined) {
        throw new Error('Unbalanced "]" in content stream');
      }
      stack[stack.length - 1].push(array);
    }
    else {
      if (stack.length > 1) {
        throw new Error(`Operator "${token.name}" inside an array`);
      }
      operations.push(new Operation(token.name, top.splice(0)));
    }
  }
  if (stack.length > 1) {
    throw new Error('Unterminated array in content stream');
  }
  if (stack[0].length > 0) {
    throw new Error(`Operands without an operator at the end of the content stream: ${stack[0].length}`);
  }
  return operations;
}
