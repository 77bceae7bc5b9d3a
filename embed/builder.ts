import {PDFDocument, PDFRef} from 'pdf-lib';

import {Operation} from '../models';
import {LayoutRequest} from '../layout/engine';
import {FirstPageOnly, GridFillOrder, GridLayout} from '../layout/strategies';
import {PdfEmbedder} from './embedder';
import {EmbedOptions} from './options';

export interface EmbedLayout {
  operations: Operation[];
  xObjectResources: Map<string, PDFRef>;
}

/**
Collects the output of several embeds into one operation list and one set
of XObject resources, e.g., for composing a single page.
*/
export class EmbedLayoutBuilder {
  private operations: Operation[] = [];
  private xObjectResources = new Map<string, PDFRef>();

  constructor(public embedder = new PdfEmbedder()) { }

  loadPdf(path: string): Promise<string> {
    return this.embedder.loadPdf(path);
  }

  addEmbeddedPdf(target: PDFDocument, sourceId: string, options: LayoutRequest): this {
    const result = this.embedder.embedPdf(target, sourceId, options);
    this.operations.push(...result.operations);
    for (const [name, ref] of result.xObjectResources) {
      this.xObjectResources.set(name, ref);
    }
    return this;
  }

  /**
  Every page of the source as a row-first grid of thumbnails, each at most
  thumbSize × thumbSize.
  */
  createThumbnailGallery(target: PDFDocument,
                         sourceId: string,
                         x: number,
                         y: number,
                         thumbSize: number,
                         columns: number,
                         gap: number): this {
    const options = new EmbedOptions()
      .withPosition(x, y)
      .withMaxSize(thumbSize, thumbSize)
      .withLayout(new GridLayout(columns, gap, gap, GridFillOrder.RowFirst));
    return this.addEmbeddedPdf(target, sourceId, options);
  }

  /**
  The first pages of two sources side by side within width × height.
  */
  createComparison(target: PDFDocument,
                   leftId: string,
                   rightId: string,
                   x: number,
                   y: number,
                   width: number,
                   height: number,
                   gap: number): this {
    const halfWidth = (width - gap) / 2;
    const options = new EmbedOptions()
      .withMaxSize(halfWidth, height)
      .withLayout(new FirstPageOnly());
    this.addEmbeddedPdf(target, leftId, options.withPosition(x, y));
    return this.addEmbeddedPdf(target, rightId, options.withPosition(x + halfWidth + gap, y));
  }

  build(): EmbedLayout {
    return {
      operations: this.operations.slice(),
      xObjectResources: new Map(this.xObjectResources),
    };
  }
}
