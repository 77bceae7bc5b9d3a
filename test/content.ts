import test from 'ava';
import {BufferIterator} from 'lexing';
import {PDFHexString, PDFName, PDFString} from 'pdf-lib';

import {Operation, encodeContent} from '../models';
import {showText} from '../operators';
import {ContentLexer, Token, decodeContent, tokenize} from '../parsers/content';
import {layoutOperations} from '../layout/engine';
import {EmbedOptions} from '../embed/options';

test('content: encodeContent should write one operation per line', t => {
  const content = encodeContent([Operation.of('m', 10, 20), Operation.of('l', 30.5, 40), Operation.of('S')]);
  t.is(content.toString('ascii'), '10 20 m\n30.5 40 l\nS\n');
});

test('content: decodeContent should parse operators with their operands', t => {
  const operations = decodeContent('q 1 0 0 1 10 20 cm /XO1 Do Q');
  t.deepEqual(operations.map(operation => operation.operator), ['q', 'cm', 'Do', 'Q']);
  t.deepEqual(operations[1].operands, [1, 0, 0, 1, 10, 20]);
  t.is(operations[2].operands[0], PDFName.of('XO1'));
});

test('content: decodeContent should parse signed and fractional numbers', t => {
  const [operation] = decodeContent('-.5 +2 3. 0.25 Td');
  t.deepEqual(operation.operands, [-0.5, 2, 3, 0.25]);
});

test('content: decodeContent should nest arrays', t => {
  const [operation] = decodeContent('[3 2] 0 d');
  t.is(operation.operator, 'd');
  t.deepEqual(operation.operands, [[3, 2], 0]);
});

test('content: decodeContent should keep literal strings escaped', t => {
  const [operation] = decodeContent('(a \\(b\\) c) Tj');
  const [operand] = operation.operands;
  t.true(operand instanceof PDFString);
  t.is(operation.toString(), '(a \\(b\\) c) Tj');
});

test('content: decodeContent should allow balanced parentheses in literal strings', t => {
  const [operation] = decodeContent('(x (y) z) Tj');
  t.is(operation.toString(), '(x (y) z) Tj');
});

test('content: decodeContent should read hex strings without whitespace', t => {
  const [operation] = decodeContent('<48 65> Tj');
  const [operand] = operation.operands;
  t.true(operand instanceof PDFHexString);
  t.is(operand.toString(), '<4865>');
});

test('content: decodeContent should decode #xx escapes in names', t => {
  const [operation] = decodeContent('/A#20B gs');
  t.is(operation.operands[0], PDFName.of('A B'));
});

test('content: decodeContent should skip comments', t => {
  const operations = decodeContent('% a comment\n0 g');
  t.deepEqual(operations.map(operation => operation.toString()), ['0 g']);
});

test('content: decodeContent should read starred and quote operators', t => {
  const operations = decodeContent("0 0 m 5 5 l f* (next) '");
  t.deepEqual(operations.map(operation => operation.operator), ['m', 'l', 'f*', "'"]);
});

test('content: decodeContent should reject trailing operands', t => {
  t.throws(() => decodeContent('0 g 1 2'), {message: 'Operands without an operator at the end of the content stream: 2'});
});

test('content: decodeContent should reject unbalanced arrays', t => {
  t.throws(() => decodeContent('] m'), {message: 'Unbalanced "]" in content stream'});
  t.throws(() => decodeContent('[1 2 d'), {message: 'Operator "d" inside an array'});
  t.throws(() => decodeContent('[1 2'), {message: 'Unterminated array in content stream'});
});

test('content: decodeContent should reject inline dictionaries', t => {
  t.throws(() => decodeContent('/OC << /A 1 >> BDC'), {message: 'Inline dictionaries are not supported in content streams'});
});

test('content: decodeContent should reject unterminated literal strings', t => {
  t.throws(() => decodeContent('(abc Tj'), {message: 'Unterminated literal string at position 0'});
});

test('content: tokenize should read from a lexing BufferIterable', t => {
  const tokens = Array.from(tokenize(new BufferIterator(Buffer.from('[1] /F1 Tf'), 0)));
  t.deepEqual(tokens.map(token => token.kind), ['arrayStart', 'operand', 'arrayEnd', 'operand', 'operator']);
});

test('content: ContentLexer should widen its window for tokens that cross it', t => {
  const lexer = new ContentLexer(new BufferIterator(Buffer.from('12345 (a (b) c) Tj'), 0), 2);
  const tokens: Token[] = [];
  for (let token = lexer.next(); token !== undefined; token = lexer.next()) {
    tokens.push(token);
  }
  t.is(tokens.length, 3);
  t.deepEqual(tokens[0], {kind: 'operand', value: 12345});
  t.deepEqual(tokens[1], {kind: 'operand', value: PDFString.of('a (b) c')});
  t.deepEqual(tokens[2], {kind: 'operator', name: 'Tj'});
});

test('content: showText should escape parentheses and backslashes', t => {
  t.is(showText('a(b)\\').toString(), '(a\\(b\\)\\\\) Tj');
});

test('content: toPDFOperator should reject unknown operators', t => {
  t.throws(() => Operation.of('XYZ').toPDFOperator(), {message: 'Unsupported content stream operator: "XYZ"'});
});

test('content: layout operations should survive encoding and decoding', t => {
  const placement = {pageIndex: 0, x: 10, y: 20, scaleX: 0.5, scaleY: 0.5, width: 50, height: 100};
  const operations = layoutOperations([placement], ['XO1'], new EmbedOptions().withClipBounds(0, 0, 300, 400));
  const decoded = decodeContent(encodeContent(operations));
  t.is(decoded.length, 9);
  t.deepEqual(decoded.map(operation => operation.toString()), operations.map(operation => operation.toString()));
  t.deepEqual(decoded.map(operation => operation.toString()), [
    'q',
    '0 0 300 400 re',
    'W',
    'n',
    'q',
    '0.5 0 0 0.5 10 20 cm',
    '/XO1 Do',
    'Q',
    'Q',
  ]);
});
