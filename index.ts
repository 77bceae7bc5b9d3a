// This file provides the most abstract API to pdfcompose. The type signatures
// of this module should follow proper versioning practices.
import {logger, Level} from './logger';

export function setLoggerLevel(level: Level) {
  logger.level = level;
}

export {logger, Level, Logger, parseLevel} from './logger';
export type {LogSink} from './logger';
export {Operation, encodeContent, toPDFOperators, literalString} from './models';
export type {Operand} from './models';
export * as operators from './operators';
export {decodeContent, tokenize, ContentLexer} from './parsers/content';
export type {Token, ContentRule} from './parsers/content';
export {decodeStream, FlateDecode, ASCIIHexDecode, ASCII85Decode} from './filters/decoders';
export {Transform} from './graphics/math';
export type {Matrix} from './graphics/math';
export {defaultPageSize, transformPoint} from './graphics/geometry';
export type {Point, Size, Rectangle} from './graphics/geometry';
export {circlePath, arcPath, polygonPath} from './graphics/paths';
export {resourceCategory, addResource, pageResources, cloneResources} from './resources';

export {
  allPages,
  singlePage,
  pageSpan,
  pageList,
  resolvePageRange,
  selectPages,
  parsePageRange,
} from './layout/selection';
export type {PageRange} from './layout/selection';
export {resolveScale} from './layout/scale';
export type {ScaleConstraints} from './layout/scale';
export {
  FirstPageOnly,
  SpecificPage,
  VerticalStack,
  HorizontalStack,
  GridLayout,
  GridFillOrder,
  CustomLayout,
} from './layout/strategies';
export type {
  PagePlacement,
  PlacementContext,
  LayoutStrategy,
  PositionFunction,
  ScaleFunction,
} from './layout/strategies';
export {
  computePlacements,
  placementOperations,
  clipOperations,
  layoutOperations,
  placementBounds,
  layoutBounds,
} from './layout/engine';
export type {ClipBounds, LayoutRequest} from './layout/engine';

export {EmbedOptions, watermarkOptions, thumbnailOptions, fullPageOptions} from './embed/options';
export {PdfEmbedder, extractPdfInfo} from './embed/embedder';
export type {EmbeddedPdfInfo, EmbedResult} from './embed/embedder';
export {importPageAsXObject, readMediaBox, readPageSize, extractContentBytes} from './embed/importer';
export {ObjectCopier} from './embed/copier';
export {EmbedLayoutBuilder} from './embed/builder';
export type {EmbedLayout} from './embed/builder';
export {applyToPage} from './embed/page';

export {Block, BlockInstance, BlockManager, mergeBlocks} from './blocks';
export type {BlockBounds} from './blocks';
export {
  Layer,
  defaultLayerConfig,
  LayerManager,
  LayerContentBuilder,
  LayerOperations,
} from './layers';
export type {LayerConfig} from './layers';

export {builtinHatchStyles, isBuiltinHatchStyle, cellMultipliers} from './hatching/styles';
export type {BuiltinHatchStyle} from './hatching/styles';
export {PatternParams, CustomPatternBuilder} from './hatching/custom';
export type {
  RGB,
  PatternSampler,
  ProceduralPattern,
  PatternElement,
  CustomPattern,
} from './hatching/custom';
export {
  HatchConfig,
  HatchingManager,
  PatternOperations,
  PatternedShapeBuilder,
  patternCellSize,
  patternOperations,
} from './hatching/manager';
export type {HatchStyle, HatchSettings, CreatedPattern} from './hatching/manager';
