import {
  PDFArray,
  PDFContext,
  PDFDict,
  PDFName,
  PDFNull,
  PDFObject,
  PDFRawStream,
  PDFRef,
  PDFStream,
} from 'pdf-lib';

import {logger} from '../logger';

/**
Deep-copies objects from one document's object space into another's.

Every indirect reference reached is dereferenced in the source and
registered in the target; a reference reached twice maps to the same target
reference, so shared objects are copied once and cycles terminate.
References to objects the source does not contain become null.
*/
export class ObjectCopier {
  private refs = new Map<PDFRef, PDFRef>();

  constructor(public source: PDFContext, public target: PDFContext) { }

  /** Number of indirect objects copied so far */
  get size(): number {
    return this.refs.size;
  }

  copy(object: PDFObject): PDFObject {
    if (object instanceof PDFRef) {
      return this.copyRef(object);
    }
    if (object instanceof PDFStream) {
      return this.copyStream(object);
    }
    if (object instanceof PDFDict) {
      return this.copyDict(object);
    }
    if (object instanceof PDFArray) {
      return this.copyArray(object);
    }
    // names, numbers, strings, booleans and null hold no references
    return object.clone(this.target);
  }

  copyRef(ref: PDFRef): PDFRef | typeof PDFNull {
    const existing = this.refs.get(ref);
    if (existing !== undefined) {
      return existing;
    }
    const resolved = this.source.lookup(ref);
    if (resolved === undefined) {
      logger.warning(`Dangling reference ${ref} replaced with null`);
      return PDFNull;
    }
    const targetRef = this.target.nextRef();
    // registered before descending so that a cycle back to `ref` finds it
    this.refs.set(ref, targetRef);
    this.target.assign(targetRef, this.copy(resolved));
    return targetRef;
  }

  copyDict(dict: PDFDict): PDFDict {
    const copy = PDFDict.withContext(this.target);
    for (const [key, value] of dict.entries()) {
      // a Parent link would drag the source's whole page tree along
      if (key !== PDFName.of('Parent')) {
        copy.set(key, this.copy(value));
      }
    }
    return copy;
  }

  copyArray(array: PDFArray): PDFArray {
    const copy = PDFArray.withContext(this.target);
    for (const item of array.asArray()) {
      copy.push(this.copy(item));
    }
    return copy;
  }

  copyStream(stream: PDFStream): PDFRawStream {
    return PDFRawStream.of(this.copyDict(stream.dict), stream.getContents());
  }
}
