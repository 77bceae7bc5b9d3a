import {LayoutStrategy} from './strategies';

/**
Which source pages (0-based) an embed considers before the layout strategy
filters them.
*/
export type PageRange =
  {kind: 'all'} |
  {kind: 'single', index: number} |
  {kind: 'range', start: number, end: number} |
  {kind: 'pages', indices: number[]};

export const allPages = (): PageRange => ({kind: 'all'});
export const singlePage = (index: number): PageRange => ({kind: 'single', index});
export const pageSpan = (start: number, end: number): PageRange => ({kind: 'range', start, end});
export const pageList = (indices: number[]): PageRange => ({kind: 'pages', indices: indices.slice()});

function indexRange(start: number, end: number): number[] {
  const indices: number[] = [];
  for (let index = start; index <= end; index++) {
    indices.push(index);
  }
  return indices;
}

/**
Expand a PageRange against a document of `totalPages` pages.

`range` is clamped to the last page (and empty when its start lies beyond
the clamped end); `single` and `pages` are returned as given, so they may
name pages that do not exist.
*/
export function resolvePageRange(range: PageRange, totalPages: number): number[] {
  switch (range.kind) {
    case 'single':
      return [range.index];
    case 'range':
      return indexRange(range.start, Math.min(range.end, totalPages - 1));
    case 'pages':
      return range.indices.slice();
    case 'all':
      return indexRange(0, totalPages - 1);
  }
}

/**
Resolve the range, then let the strategy narrow it down
(e.g., FirstPageOnly keeps at most one page).
*/
export function selectPages(range: PageRange, strategy: LayoutStrategy, totalPages: number): number[] {
  return strategy.filterPages(resolvePageRange(range, totalPages), totalPages);
}

function parsePageNumber(text: string, input: string): number {
  if (!/^\d+$/.test(text)) {
    throw new Error(`Invalid page number "${text}" in page range "${input}"`);
  }
  const page = parseInt(text, 10);
  if (page < 1) {
    throw new Error(`Page numbers start at 1; got ${page} in page range "${input}"`);
  }
  return page - 1;
}

/**
Parse 1-based, human-written page selections: "all", "3", "2-5", or "1,3,7".
*/
export function parsePageRange(input: string): PageRange {
  const text = input.trim().toLowerCase();
  if (text === 'all' || text === '') {
    return allPages();
  }
  const spanMatch = text.match(/^(\d+)\s*-\s*(\d+)$/);
  if (spanMatch) {
    const start = parsePageNumber(spanMatch[1], input);
    const end = parsePageNumber(spanMatch[2], input);
    if (end < start) {
      throw new Error(`Page range "${input}" ends before it starts`);
    }
    return pageSpan(start, end);
  }
  const parts = text.split(',').map(part => part.trim());
  if (parts.length === 1) {
    return singlePage(parsePageNumber(parts[0], input));
  }
  return pageList(parts.map(part => parsePageNumber(part, input)));
}
