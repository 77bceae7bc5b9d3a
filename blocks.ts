import {PDFDict, PDFDocument, PDFRef} from 'pdf-lib';

import {logger} from './logger';
import {Operation, encodeContent} from './models';
import {pushGraphicsState, popGraphicsState, drawObject} from './operators';
import {Transform} from './graphics/math';
import {decodeContent} from './parsers/content';
import {addResource} from './resources';

export interface BlockBounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
A named, reusable sequence of content operations (a logo, a stamp, a
letterhead) that can be drawn many times at different transforms.
*/
export class Block {
  constructor(public id: string,
              public operations: Operation[] = [],
              public bbox?: BlockBounds,
              public resources?: PDFDict) { }

  /**
  Build a block from content stream text, e.g., `0 0 10 10 re f`.
  */
  static fromContent(id: string, content: string): Block {
    return new Block(id, decodeContent(content));
  }

  withBBox(x: number, y: number, width: number, height: number): this {
    this.bbox = {x, y, width, height};
    return this;
  }

  withResources(resources: PDFDict): this {
    this.resources = resources;
    return this;
  }

  addOperation(operation: Operation): void {
    this.operations.push(operation);
  }

  addOperations(operations: Operation[]): void {
    this.operations.push(...operations);
  }
}

export class BlockInstance {
  constructor(public blockId: string, public transform: Transform) { }

  static at(blockId: string, x: number, y: number): BlockInstance {
    return new BlockInstance(blockId, Transform.translate(x, y));
  }

  static atScaled(blockId: string, x: number, y: number, scale: number): BlockInstance {
    return new BlockInstance(blockId, Transform.translateScale(x, y, scale));
  }
}

function blockBBox(block: Block): number[] {
  if (block.bbox === undefined) {
    return [0, 0, 100, 100];
  }
  const {x, y, width, height} = block.bbox;
  return [x, y, x + width, y + height];
}

/**
Registry of blocks by id. Instances are drawn either inline (the block's
operations repeated at each instance) or through one Form XObject per
block.
*/
export class BlockManager {
  private blocks = new Map<string, Block>();
  private xObjects = new Map<string, PDFRef>();
  private xObjectCounter = 0;

  /** Replaces any block registered under the same id */
  register(block: Block): void {
    this.blocks.set(block.id, block);
  }

  registerBlocks(blocks: Block[]): void {
    blocks.forEach(block => this.register(block));
  }

  get(id: string): Block | undefined {
    return this.blocks.get(id);
  }

  has(id: string): boolean {
    return this.blocks.has(id);
  }

  remove(id: string): Block | undefined {
    const block = this.blocks.get(id);
    this.blocks.delete(id);
    this.xObjects.delete(id);
    return block;
  }

  count(): number {
    return this.blocks.size;
  }

  clear(): void {
    this.blocks.clear();
    this.xObjects.clear();
    this.xObjectCounter = 0;
  }

  /**
  `q`, the instance's `cm`, the block's operations, `Q`; nothing for an
  unknown block.
  */
  renderInstance(instance: BlockInstance): Operation[] {
    const block = this.blocks.get(instance.blockId);
    if (block === undefined) {
      logger.debug(`no block "${instance.blockId}" to render`);
      return [];
    }
    return [
      pushGraphicsState(),
      instance.transform.toOperation(),
      ...block.operations,
      popGraphicsState(),
    ];
  }

  renderInstances(instances: BlockInstance[]): Operation[] {
    return instances.flatMap(instance => this.renderInstance(instance));
  }

  /**
  Create a Form XObject in `document` for every registered block that does
  not have one yet.
  */
  createXObjects(document: PDFDocument): void {
    for (const [id, block] of this.blocks) {
      if (!this.xObjects.has(id)) {
        const stream = document.context.stream(encodeContent(block.operations), {
          Type: 'XObject',
          Subtype: 'Form',
          BBox: blockBBox(block),
          ...(block.resources ? {Resources: block.resources} : {}),
        });
        this.xObjects.set(id, document.context.register(stream));
      }
    }
  }

  getXObject(id: string): PDFRef | undefined {
    return this.xObjects.get(id);
  }

  /**
  Draw each instance through its block's XObject, registering a fresh name
  (Blk0, Blk1, ...) per instance in the `XObject` category of `resources`.
  Instances of blocks without an XObject (see createXObjects) are skipped.
  */
  renderInstancesAsXObjects(instances: BlockInstance[], resources: PDFDict): Operation[] {
    return instances.flatMap((instance): Operation[] => {
      const ref = this.xObjects.get(instance.blockId);
      if (ref === undefined) {
        return [];
      }
      const name = `Blk${this.xObjectCounter++}`;
      addResource(resources, 'XObject', name, ref);
      return [
        pushGraphicsState(),
        instance.transform.toOperation(),
        drawObject(name),
        popGraphicsState(),
      ];
    });
  }
}

/**
Concatenate the operations of several blocks, in order.
*/
export function mergeBlocks(blocks: Block[]): Operation[] {
  return blocks.flatMap(block => block.operations);
}
