import * as fs from 'fs';
import chalk from 'chalk';
import {PDFDocument, PageSizes} from 'pdf-lib';

import {logger} from '../logger';
import {formatRectangle} from '../graphics/geometry';
import {EmbedOptions} from '../embed/options';
import {PdfEmbedder} from '../embed/embedder';
import {applyToPage} from '../embed/page';
import {parsePageRange} from '../layout/selection';
import {GridLayout, HorizontalStack, LayoutStrategy, VerticalStack} from '../layout/strategies';

function stdout(line: string) {
  process.stdout.write(line + '\n');
}

export async function info(filename: string): Promise<void> {
  const embedder = new PdfEmbedder();
  const identifier = await embedder.loadPdf(filename);
  const pdfInfo = embedder.getPdfInfo(identifier);
  if (pdfInfo === undefined) {
    throw new Error(`PDF "${filename}" not loaded`);
  }
  stdout(JSON.stringify({
    pageCount: pdfInfo.pageCount,
    pageDimensions: pdfInfo.pageDimensions,
    metadata: Object.fromEntries(pdfInfo.metadata),
  }, null, 2));
}

export const pageSizes = {
  a4: PageSizes.A4,
  letter: PageSizes.Letter,
};

export type PageSizeName = keyof typeof pageSizes;
export type TileLayoutName = 'grid' | 'vertical' | 'horizontal';

export interface TileSettings {
  /** 1-based page selection, e.g., "1-4" */
  pages: string;
  pageSize: PageSizeName;
  layout: TileLayoutName;
  columns: number;
  gap: number;
  /** Maximum width and height of each placed page; fills the row when unset */
  cell?: number;
  margin: number;
}

/**
Embed options that tile the selected pages onto a page of `pageSize`,
starting at the top-left margin.
*/
export function tileOptions(settings: TileSettings): EmbedOptions {
  const [pageWidth, pageHeight] = pageSizes[settings.pageSize];
  const {columns, gap, margin} = settings;
  const cell = settings.cell !== undefined ? settings.cell :
    (pageWidth - 2 * margin - (columns - 1) * gap) / columns;
  const layouts: {[L in TileLayoutName]: () => LayoutStrategy} = {
    grid: () => new GridLayout(columns, gap, gap),
    vertical: () => new VerticalStack(gap),
    horizontal: () => new HorizontalStack(gap),
  };
  return new EmbedOptions()
    .withPosition(margin, pageHeight - margin - cell)
    .withMaxSize(cell, cell)
    .withLayout(layouts[settings.layout]())
    .withPageRange(parsePageRange(settings.pages));
}

export async function tile(filename: string, output: string, settings: TileSettings): Promise<void> {
  const embedder = new PdfEmbedder();
  const identifier = await embedder.loadPdf(filename);
  const target = await PDFDocument.create();
  const page = target.addPage(pageSizes[settings.pageSize]);
  const result = embedder.embedPdf(target, identifier, tileOptions(settings));
  applyToPage(page, result);
  fs.writeFileSync(output, await target.save());
  const bounds = result.bounds ? formatRectangle(result.bounds) : 'nothing';
  logger.info(`placed ${chalk.cyan(result.placements.length.toString())} pages covering ${bounds} in ${chalk.green(output)}`);
}
