import {PDFPage, PDFRef} from 'pdf-lib';

import {Operation, toPDFOperators} from '../models';
import {addResource, pageResources} from '../resources';

/**
Register the XObjects named by the operations in the page's resources and
append the operations to the page's content.
*/
export function applyToPage(page: PDFPage, {operations, xObjectResources}: {operations: Operation[], xObjectResources: Map<string, PDFRef>}): void {
  const resources = pageResources(page);
  for (const [name, ref] of xObjectResources) {
    addResource(resources, 'XObject', name, ref);
  }
  page.pushOperators(...toPDFOperators(operations));
}
