import * as fs from 'fs';
import {PDFDict, PDFDocument, PDFHexString, PDFRef, PDFString} from 'pdf-lib';

import {logger} from '../logger';
import {Operation} from '../models';
import {Rectangle, Size} from '../graphics/geometry';
import {LayoutRequest, computePlacements, layoutBounds, layoutOperations} from '../layout/engine';
import {selectPages} from '../layout/selection';
import {PagePlacement} from '../layout/strategies';
import {ObjectCopier} from './copier';
import {importPageAsXObject, readPageSize} from './importer';
import {EmbedOptions} from './options';

export interface EmbeddedPdfInfo {
  pageCount: number;
  /** Indexed by page index */
  pageDimensions: Size[];
  /** Every string entry of the document's Info dictionary */
  metadata: Map<string, string>;
}

export interface EmbedResult {
  /** Content operations to append to the target page */
  operations: Operation[];
  /** XObject name → reference, to register in the target page's resources */
  xObjectResources: Map<string, PDFRef>;
  placements: PagePlacement[];
  /** Area covered by the placed pages; undefined when no page was placed */
  bounds?: Rectangle;
}

interface LoadedPdf {
  document: PDFDocument;
  info: EmbeddedPdfInfo;
}

function readMetadata(document: PDFDocument): Map<string, string> {
  const metadata = new Map<string, string>();
  const info = document.context.lookup(document.context.trailerInfo.Info);
  if (info instanceof PDFDict) {
    for (const [key, value] of info.entries()) {
      const resolved = document.context.lookup(value);
      if (resolved instanceof PDFString || resolved instanceof PDFHexString) {
        metadata.set(key.decodeText(), resolved.decodeText());
      }
    }
  }
  return metadata;
}

export function extractPdfInfo(document: PDFDocument): EmbeddedPdfInfo {
  const pageDimensions = document.getPages().map(page => readPageSize(page.node));
  return {
    pageCount: pageDimensions.length,
    pageDimensions,
    metadata: readMetadata(document),
  };
}

/**
Loads source PDFs and embeds their pages into target documents as Form
XObjects.

Sources are cached by identifier (a file path, or a caller-chosen name for
bytes and in-memory documents); loading the same identifier twice is a no-op.
XObject names (XO1, XO2, ...) are unique across all embeds made by one
embedder.
*/
export class PdfEmbedder {
  private loaded = new Map<string, LoadedPdf>();
  private resourceCounter = 0;

  async loadPdf(path: string): Promise<string> {
    if (this.loaded.has(path)) {
      return path;
    }
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(path);
    }
    catch (exc) {
      const message = exc instanceof Error ? exc.message : String(exc);
      throw new Error(`Failed to load PDF "${path}": ${message}`);
    }
    return this.loadPdfFromBytes(bytes, path);
  }

  async loadPdfFromBytes(bytes: Uint8Array, identifier: string): Promise<string> {
    if (this.loaded.has(identifier)) {
      return identifier;
    }
    let document: PDFDocument;
    try {
      document = await PDFDocument.load(bytes, {updateMetadata: false});
    }
    catch (exc) {
      const message = exc instanceof Error ? exc.message : String(exc);
      throw new Error(`Failed to load PDF "${identifier}" from bytes: ${message}`);
    }
    return this.registerDocument(identifier, document);
  }

  /**
  Use an already-parsed (or freshly built) document as an embedding source.
  */
  registerDocument(identifier: string, document: PDFDocument): string {
    if (this.loaded.has(identifier)) {
      return identifier;
    }
    const info = extractPdfInfo(document);
    logger.debug(`loaded "${identifier}" with ${info.pageCount} pages`);
    this.loaded.set(identifier, {document, info});
    return identifier;
  }

  getPdfInfo(identifier: string): EmbeddedPdfInfo | undefined {
    const loaded = this.loaded.get(identifier);
    return loaded && loaded.info;
  }

  /**
  Import the pages selected by `options` into `target` and return the
  operations that draw them, along with the XObjects those operations name.

  The XObjects are added to `target`'s object space but not to any page; see
  applyToPage().
  */
  embedPdf(target: PDFDocument, identifier: string, options: LayoutRequest = new EmbedOptions()): EmbedResult {
    const loaded = this.loaded.get(identifier);
    if (loaded === undefined) {
      throw new Error(`PDF "${identifier}" not loaded`);
    }
    const {document, info} = loaded;
    const pages = selectPages(options.pageRange, options.layout, info.pageCount);
    const missing = pages.filter(pageIndex => !(pageIndex >= 0 && pageIndex < info.pageCount));
    if (missing.length > 0) {
      throw new Error(`Page ${missing[0]} not found in "${identifier}" (${info.pageCount} pages)`);
    }
    logger.debug(`selected pages [${pages.join(', ')}] of "${identifier}"`);

    const placements = computePlacements(info.pageDimensions, pages, options);
    const copier = new ObjectCopier(document.context, target.context);
    const xObjectResources = new Map<string, PDFRef>();
    const names = placements.map(({pageIndex}) => {
      const name = `XO${++this.resourceCounter}`;
      xObjectResources.set(name, importPageAsXObject(target, document, pageIndex, copier));
      return name;
    });

    return {
      operations: layoutOperations(placements, names, options),
      xObjectResources,
      placements,
      bounds: layoutBounds(placements, options.rotation),
    };
  }
}
