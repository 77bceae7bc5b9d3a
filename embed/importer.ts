import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFName,
  PDFNumber,
  PDFObject,
  PDFPageLeaf,
  PDFRef,
  PDFStream,
} from 'pdf-lib';

import {logger} from '../logger';
import {Rectangle, Size, defaultPageSize, makeRectangle} from '../graphics/geometry';
import {decodeStream} from '../filters/decoders';
import {ObjectCopier} from './copier';

const defaultMediaBox = makeRectangle(0, 0, defaultPageSize.width, defaultPageSize.height);

/**
Read a page's (possibly inherited) MediaBox.

Falls back to the default page box when the entry is missing, is not an
array of at least four entries, or encloses no area; a single non-numeric
coordinate falls back to the default for that coordinate.
*/
export function readMediaBox(page: PDFPageLeaf): Rectangle {
  const box = page.context.lookup(page.getInheritableAttribute(PDFName.of('MediaBox')));
  if (!(box instanceof PDFArray) || box.size() < 4) {
    logger.warning(`Page has no usable MediaBox; using ${defaultPageSize.width}x${defaultPageSize.height}`);
    return defaultMediaBox;
  }
  const [minX, minY, maxX, maxY] = [
    defaultMediaBox.minX,
    defaultMediaBox.minY,
    defaultMediaBox.maxX,
    defaultMediaBox.maxY,
  ].map((fallback, index) => {
    const value = box.lookup(index);
    return value instanceof PDFNumber ? value.asNumber() : fallback;
  });
  if (maxX - minX === 0 || maxY - minY === 0) {
    logger.warning(`Page MediaBox encloses no area; using ${defaultPageSize.width}x${defaultPageSize.height}`);
    return defaultMediaBox;
  }
  return makeRectangle(minX, minY, maxX, maxY);
}

export function readPageSize(page: PDFPageLeaf): Size {
  const {minX, minY, maxX, maxY} = readMediaBox(page);
  return {width: Math.abs(maxX - minX), height: Math.abs(maxY - minY)};
}

/**
Return the page's decoded content: a single stream as-is, or the members of
a Contents array joined by newlines. Missing or undecodable content is
returned as empty content; an array member that cannot be decoded is left
out and the other members are kept.
*/
export function extractContentBytes(page: PDFPageLeaf): Buffer {
  const contents = page.lookup(PDFName.of('Contents'));
  if (contents instanceof PDFStream) {
    const decoded = decodeMember(contents, 'page content');
    return decoded !== undefined ? decoded : Buffer.alloc(0);
  }
  if (contents instanceof PDFArray) {
    const streams: Buffer[] = [];
    contents.asArray().forEach((_, index) => {
      const decoded = decodeMember(contents.lookup(index), `Contents[${index}]`);
      if (decoded !== undefined) {
        streams.push(decoded);
      }
    });
    return Buffer.concat(streams.flatMap((stream, index) => index === 0 ? [stream] : [Buffer.from('\n'), stream]));
  }
  logger.warning('Page has no Contents; importing it as an empty page');
  return Buffer.alloc(0);
}

function decodeMember(member: PDFObject | undefined, label: string): Buffer | undefined {
  if (!(member instanceof PDFStream)) {
    logger.warning(`${label} is not a stream; skipping it`);
    return undefined;
  }
  try {
    return decodeStream(member);
  }
  catch (exc) {
    const message = exc instanceof Error ? exc.message : String(exc);
    logger.warning(`Could not decode ${label} (${message}); skipping it`);
    return undefined;
  }
}

/**
Copy one page of `source` into `target` as a Form XObject and return the
new object's reference.

The XObject's BBox is the page's MediaBox, its Matrix the identity, and its
Resources a deep copy of the page's (inherited) resources.
*/
export function importPageAsXObject(target: PDFDocument,
                                    source: PDFDocument,
                                    pageIndex: number,
                                    copier = new ObjectCopier(source.context, target.context)): PDFRef {
  const pageCount = source.getPageCount();
  if (pageIndex < 0 || pageIndex >= pageCount) {
    throw new Error(`Page ${pageIndex} not found (source has ${pageCount} pages)`);
  }
  const page = source.getPage(pageIndex).node;
  const {minX, minY, maxX, maxY} = readMediaBox(page);
  const resources = source.context.lookup(page.getInheritableAttribute(PDFName.of('Resources')));
  const xObject = target.context.flateStream(extractContentBytes(page), {
    Type: 'XObject',
    Subtype: 'Form',
    BBox: [minX, minY, maxX, maxY],
    Matrix: [1, 0, 0, 1, 0, 0],
    Resources: resources instanceof PDFDict ? copier.copyDict(resources) : PDFDict.withContext(target.context),
  });
  return target.context.register(xObject);
}
