import {PDFDict, PDFName, PDFObject, PDFPage} from 'pdf-lib';

/**
A resource dictionary's sub-dictionary for one category (XObject, Pattern,
Properties, ...), created when missing. Entries already present are kept.
*/
export function resourceCategory(resources: PDFDict, category: string): PDFDict {
  const key = PDFName.of(category);
  const existing = resources.context.lookup(resources.get(key));
  if (existing instanceof PDFDict) {
    return existing;
  }
  const created = PDFDict.withContext(resources.context);
  resources.set(key, created);
  return created;
}

export function addResource(resources: PDFDict, category: string, name: string, value: PDFObject): void {
  resourceCategory(resources, category).set(PDFName.of(name), value);
}

const resourceCategories = ['ExtGState', 'ColorSpace', 'Pattern', 'Shading', 'XObject', 'Font', 'Properties'];

function inheritedResources(leaf: PDFDict): PDFDict | undefined {
  let node = leaf.lookupMaybe(PDFName.of('Parent'), PDFDict);
  while (node !== undefined) {
    const resources = node.lookupMaybe(PDFName.of('Resources'), PDFDict);
    if (resources !== undefined) {
      return resources;
    }
    node = node.lookupMaybe(PDFName.of('Parent'), PDFDict);
  }
  return undefined;
}

/**
Copy a Resources dictionary and each of its category dictionaries. The
resources themselves (fonts, XObjects, ...) are shared.
*/
export function cloneResources(resources: PDFDict): PDFDict {
  const clone = resources.clone();
  for (const category of resourceCategories) {
    const dict = resources.lookupMaybe(PDFName.of(category), PDFDict);
    if (dict !== undefined) {
      clone.set(PDFName.of(category), dict.clone());
    }
  }
  return clone;
}

/**
The page's own Resources dictionary. A page that inherits its resources from
the page tree, directly or through a dictionary pdf-lib installed on it when
normalizing, gets a copy of them first, so additions never leak into sibling
pages.
*/
export function pageResources(page: PDFPage): PDFDict {
  const {node} = page;
  const own = node.lookupMaybe(PDFName.of('Resources'), PDFDict);
  const inherited = inheritedResources(node);
  if (inherited !== undefined && (own === undefined || own === inherited)) {
    node.set(PDFName.of('Resources'), cloneResources(inherited));
  }
  return node.normalizedEntries().Resources;
}
