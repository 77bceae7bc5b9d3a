import test from 'ava';
import {PageSizes} from 'pdf-lib';

import {tileOptions, TileSettings} from '../bin/commands';
import {GridLayout, VerticalStack} from '../layout/strategies';

const settings: TileSettings = {
  pages: '1-4',
  pageSize: 'a4',
  layout: 'grid',
  columns: 2,
  gap: 10,
  margin: 36,
};

test('cli: tile should fill the row between the margins by default', t => {
  const [pageWidth, pageHeight] = PageSizes.A4;
  const cell = (pageWidth - 72 - 10) / 2;
  const options = tileOptions(settings);
  t.deepEqual([options.x, options.y], [36, pageHeight - 36 - cell]);
  t.deepEqual([options.maxWidth, options.maxHeight], [cell, cell]);
  t.true(options.layout instanceof GridLayout);
  t.deepEqual(options.pageRange, {kind: 'range', start: 0, end: 3});
});

test('cli: tile should honor an explicit cell size and layout', t => {
  const [, pageHeight] = PageSizes.Letter;
  const options = tileOptions({...settings, pageSize: 'letter', layout: 'vertical', cell: 100, pages: 'all'});
  t.deepEqual([options.x, options.y, options.maxWidth], [36, pageHeight - 36 - 100, 100]);
  t.true(options.layout instanceof VerticalStack);
  t.deepEqual(options.pageRange, {kind: 'all'});
});

test('cli: tile should reject malformed page selections', t => {
  t.throws(() => tileOptions({...settings, pages: '4-1'}), {message: 'Page range "4-1" ends before it starts'});
});
