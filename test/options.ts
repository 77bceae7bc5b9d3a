import test from 'ava';

import {EmbedOptions, watermarkOptions, thumbnailOptions, fullPageOptions} from '../embed/options';
import {singlePage} from '../layout/selection';
import {FirstPageOnly, VerticalStack} from '../layout/strategies';

test('embed/options: defaults should place the first page at the origin', t => {
  const options = new EmbedOptions();
  t.deepEqual([options.x, options.y, options.scaleX, options.scaleY, options.rotation, options.opacity], [0, 0, 1, 1, 0, 1]);
  t.is(options.maxWidth, undefined);
  t.is(options.maxHeight, undefined);
  t.is(options.clipBounds, undefined);
  t.true(options.preserveAspectRatio);
  t.true(options.layout instanceof FirstPageOnly);
  t.deepEqual(options.pageRange, {kind: 'all'});
});

test('embed/options: with* methods should leave the original untouched', t => {
  const base = new EmbedOptions();
  const moved = base.withPosition(5, 6).withScale(0.5).withLayout(new VerticalStack(4)).withPageRange(singlePage(2));
  t.deepEqual([base.x, base.y, base.scaleX], [0, 0, 1]);
  t.deepEqual([moved.x, moved.y, moved.scaleX, moved.scaleY], [5, 6, 0.5, 0.5]);
  t.is(moved.layout.name, 'vertical');
  t.deepEqual(moved.pageRange, {kind: 'single', index: 2});
});

test('embed/options: settings should carry through later with* calls', t => {
  const options = new EmbedOptions()
    .withMaxWidth(100)
    .withMaxHeight(50)
    .withPreserveAspectRatio(false)
    .withScaleXY(2, 3)
    .withClipBounds(1, 2, 3, 4);
  t.deepEqual([options.maxWidth, options.maxHeight, options.scaleX, options.scaleY], [100, 50, 2, 3]);
  t.false(options.preserveAspectRatio);
  t.deepEqual(options.clipBounds, {x: 1, y: 2, width: 3, height: 4});
});

test('embed/options: opacity should be clamped to [0, 1]', t => {
  t.is(new EmbedOptions().withOpacity(1.5).opacity, 1);
  t.is(new EmbedOptions().withOpacity(-1).opacity, 0);
  t.is(new EmbedOptions({opacity: 0.25}).opacity, 0.25);
});

test('embed/options: NaN opacity should fall back to opaque', t => {
  t.is(new EmbedOptions().withOpacity(NaN).opacity, 1);
  t.is(new EmbedOptions({opacity: NaN}).opacity, 1);
});

test('embed/options: presets', t => {
  const watermark = watermarkOptions(0.3, 0.5);
  t.deepEqual([watermark.x, watermark.y, watermark.rotation, watermark.opacity, watermark.scaleX, watermark.scaleY], [100, 100, 45, 0.3, 0.5, 0.5]);

  const thumbnail = thumbnailOptions(10, 20, 150);
  t.deepEqual([thumbnail.x, thumbnail.y, thumbnail.maxWidth, thumbnail.maxHeight], [10, 20, 150, 150]);

  const fullPage = fullPageOptions(612, 792);
  t.deepEqual([fullPage.x, fullPage.y, fullPage.maxWidth, fullPage.maxHeight], [0, 0, 612, 792]);
});
