import test from 'ava';

import {Transform} from '../graphics/math';
import {makeRectangle, formatRectangle, boundingPoints, boundingRectangle, transformPoint} from '../graphics/geometry';
import {circlePath, arcPath, polygonPath} from '../graphics/paths';

test('graphics should format rectangle string', t => {
  const unitRect = makeRectangle(0, 0, 1, 1);
  t.is(formatRectangle(unitRect), '[0, 0, 1, 1]');
});

test('graphics should bound points and rectangles', t => {
  t.deepEqual(boundingPoints({x: 3, y: -1}, {x: -2, y: 4}, {x: 0, y: 0}), makeRectangle(-2, -1, 3, 4));
  t.deepEqual(boundingRectangle(makeRectangle(0, 0, 1, 1), makeRectangle(5, -5, 6, 0)), makeRectangle(0, -5, 6, 1));
});

test('graphics should transform points', t => {
  t.deepEqual(transformPoint({x: 1, y: 2}, [2, 0, 0, 3, 10, 20]), {x: 12, y: 26});
});

test('graphics/math: unrotated transforms should produce an exact scale-translate matrix', t => {
  t.deepEqual(new Transform(2, 3, 0, 10, 20).toMatrix(), [2, 0, 0, 3, 10, 20]);
  t.deepEqual(Transform.identity().toMatrix(), [1, 0, 0, 1, 0, 0]);
  t.deepEqual(Transform.translateScaleXY(5, 6, 0.5, 0.25).toMatrix(), [0.5, 0, 0, 0.25, 5, 6]);
});

test('graphics/math: a quarter turn should swap the axes', t => {
  const matrix = Transform.full(7, 8, 1, 1, 90).toMatrix();
  t.deepEqual(matrix.map(value => Math.round(value * 1e6) / 1e6), [0, 1, -1, 0, 7, 8]);
});

test('graphics/math: toOperation should emit a cm operation', t => {
  t.is(Transform.translate(5, 6).toOperation().toString(), '1 0 0 1 5 6 cm');
  t.is(Transform.translateScale(1, 2, 3).toOperation().toString(), '3 0 0 3 1 2 cm');
});

test('graphics/paths: circlePath should start and end at the 0° point', t => {
  const operations = circlePath(10, 10, 5);
  t.deepEqual(operations.map(operation => operation.operator), ['m', 'c', 'c', 'c', 'c']);
  t.deepEqual(operations[0].operands, [15, 10]);
  t.deepEqual(operations[4].operands.slice(4), [15, 10]);
});

test('graphics/paths: arcPath should be a single curve', t => {
  const operations = arcPath(0, 0, 1, 0, Math.PI / 2);
  t.deepEqual(operations.map(operation => operation.operator), ['m', 'c']);
  t.deepEqual(operations[0].operands, [1, 0]);
});

test('graphics/paths: polygonPath should close the path', t => {
  const operations = polygonPath([[0, 0], [10, 0], [5, 5]]);
  t.deepEqual(operations.map(operation => operation.toString()), ['0 0 m', '10 0 l', '5 5 l', 'h']);
  t.deepEqual(polygonPath([]), []);
});
