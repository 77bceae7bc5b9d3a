import test from 'ava';
import {PDFDict, PDFDocument, PDFName} from 'pdf-lib';

import {Block, BlockInstance, BlockManager, mergeBlocks} from '../blocks';
import {decodeStream} from '../filters/decoders';
import {rectangle, fill, stroke} from '../operators';
import {addResource, resourceCategory} from '../resources';
import {numbers, lookupStream} from './_helpers';

function logoManager(): BlockManager {
  const manager = new BlockManager();
  manager.register(new Block('logo', [rectangle(0, 0, 10, 10), fill()]));
  return manager;
}

test('blocks: renderInstance should wrap the block in its transform', t => {
  const operations = logoManager().renderInstance(BlockInstance.at('logo', 5, 6));
  t.deepEqual(operations.map(operation => operation.toString()), ['q', '1 0 0 1 5 6 cm', '0 0 10 10 re', 'f', 'Q']);
});

test('blocks: atScaled should scale both axes', t => {
  const [, transform] = logoManager().renderInstance(BlockInstance.atScaled('logo', 1, 2, 2));
  t.is(transform.toString(), '2 0 0 2 1 2 cm');
});

test('blocks: unknown blocks should render nothing', t => {
  const manager = logoManager();
  t.deepEqual(manager.renderInstance(BlockInstance.at('missing', 0, 0)), []);
  const operations = manager.renderInstances([BlockInstance.at('missing', 0, 0), BlockInstance.at('logo', 0, 0)]);
  t.is(operations.length, 5);
});

test('blocks: fromContent should parse content stream text', t => {
  const block = Block.fromContent('stamp', '1 0 0 RG 0 0 m 20 20 l S');
  t.deepEqual(block.operations.map(operation => operation.toString()), ['1 0 0 RG', '0 0 m', '20 20 l', 'S']);
});

test('blocks: registry should register, replace and remove blocks', t => {
  const manager = logoManager();
  manager.registerBlocks([new Block('a'), new Block('b')]);
  t.is(manager.count(), 3);
  t.true(manager.has('a'));
  manager.register(new Block('logo', [stroke()]));
  t.is(manager.count(), 3);
  t.deepEqual(manager.get('logo')?.operations.map(operation => operation.toString()), ['S']);
  t.is(manager.remove('a')?.id, 'a');
  t.false(manager.has('a'));
  t.is(manager.remove('a'), undefined);
});

test('blocks: mergeBlocks should concatenate operations in order', t => {
  const first = new Block('first', [fill()]);
  const second = new Block('second');
  second.addOperations([rectangle(1, 1, 2, 2), stroke()]);
  t.deepEqual(mergeBlocks([first, second]).map(operation => operation.toString()), ['f', '1 1 2 2 re', 'S']);
});

test('blocks: createXObjects should build one Form XObject per block', async t => {
  const document = await PDFDocument.create();
  const manager = logoManager();
  manager.register(new Block('framed', [stroke()]).withBBox(5, 5, 20, 30));
  manager.createXObjects(document);

  const logo = lookupStream(document, manager.getXObject('logo'));
  t.is(logo.dict.get(PDFName.of('Subtype')), PDFName.of('Form'));
  t.deepEqual(numbers(logo.dict.get(PDFName.of('BBox'))), [0, 0, 100, 100]);
  t.is(decodeStream(logo).toString('ascii'), '0 0 10 10 re\nf\n');

  const framed = lookupStream(document, manager.getXObject('framed'));
  t.deepEqual(numbers(framed.dict.get(PDFName.of('BBox'))), [5, 5, 25, 35]);
});

test('blocks: createXObjects should not recreate existing XObjects', async t => {
  const document = await PDFDocument.create();
  const manager = logoManager();
  manager.createXObjects(document);
  const ref = manager.getXObject('logo');
  manager.createXObjects(document);
  t.is(manager.getXObject('logo'), ref);
});

test('blocks: block resources should be attached to the XObject', async t => {
  const document = await PDFDocument.create();
  const manager = new BlockManager();
  const resources = document.context.obj({ProcSet: ['PDF']});
  manager.register(new Block('text', [fill()]).withResources(resources));
  manager.createXObjects(document);
  const xObject = lookupStream(document, manager.getXObject('text'));
  t.is(xObject.dict.get(PDFName.of('Resources')), resources);
});

test('blocks: renderInstancesAsXObjects should name each instance', async t => {
  const document = await PDFDocument.create();
  const manager = logoManager();
  manager.createXObjects(document);
  const resources = PDFDict.withContext(document.context);
  const keep = document.context.nextRef();
  addResource(resources, 'XObject', 'Keep', keep);

  const operations = manager.renderInstancesAsXObjects([
    BlockInstance.at('logo', 0, 0),
    BlockInstance.at('missing', 0, 0),
    BlockInstance.at('logo', 50, 0),
  ], resources);
  t.deepEqual(operations.map(operation => operation.toString()), [
    'q', '1 0 0 1 0 0 cm', '/Blk0 Do', 'Q',
    'q', '1 0 0 1 50 0 cm', '/Blk1 Do', 'Q',
  ]);
  const xObjects = resourceCategory(resources, 'XObject');
  t.is(xObjects.get(PDFName.of('Keep')), keep);
  t.is(xObjects.get(PDFName.of('Blk0')), manager.getXObject('logo'));
  t.is(xObjects.get(PDFName.of('Blk1')), manager.getXObject('logo'));
});

test('blocks: remove and clear should forget XObjects', async t => {
  const document = await PDFDocument.create();
  const manager = logoManager();
  manager.createXObjects(document);
  const resources = PDFDict.withContext(document.context);
  manager.renderInstancesAsXObjects([BlockInstance.at('logo', 0, 0)], resources);

  manager.clear();
  t.is(manager.count(), 0);
  t.is(manager.getXObject('logo'), undefined);

  manager.register(new Block('logo', [fill()]));
  manager.createXObjects(document);
  const [, , draw] = manager.renderInstancesAsXObjects([BlockInstance.at('logo', 0, 0)], resources);
  t.is(draw.toString(), '/Blk0 Do');
  manager.remove('logo');
  t.is(manager.getXObject('logo'), undefined);
});
