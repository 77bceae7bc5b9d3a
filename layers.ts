import {PDFArray, PDFDict, PDFDocument, PDFHexString, PDFName, PDFRef} from 'pdf-lib';

import {Operation} from './models';
import {
  beginMarkedContent,
  endMarkedContent,
  rectangle,
  fill,
  stroke,
  setFillColorRgb,
  setStrokeColorRgb,
  setFillColorGray,
  beginText,
  endText,
  setFont,
  moveText,
  showText,
} from './operators';
import {addResource} from './resources';

/**
One Optional Content Group (PDF32000_2008.pdf:8.11.2): a named set of
content that viewers can show or hide.
*/
export class Layer {
  /** Set by LayerManager.initialize() */
  ref?: PDFRef;
  /** Resource tag (L0, L1, ...) set by LayerManager.setupPageResources() */
  tag?: string;

  constructor(public name: string, public defaultVisible = true) { }

  withVisibility(visible: boolean): this {
    this.defaultVisible = visible;
    return this;
  }
}

export interface LayerConfig {
  /** State of layers not listed in ON or OFF: "ON", "OFF", or "Unchanged" */
  baseState: string;
  /** Show the layers in the viewer's layer panel on every page */
  createPanelUi: boolean;
  intent: string[];
}

export const defaultLayerConfig: LayerConfig = {
  baseState: 'ON',
  createPanelUi: true,
  intent: ['View'],
};

export class LayerManager {
  layers: Layer[] = [];
  config: LayerConfig;
  private ocPropertiesRef?: PDFRef;
  private index = new Map<string, number>();

  constructor(config: Partial<LayerConfig> = {}) {
    this.config = {...defaultLayerConfig, ...config};
  }

  /** Returns the new layer's index */
  addLayer(layer: Layer): number {
    const index = this.layers.length;
    this.index.set(layer.name, index);
    this.layers.push(layer);
    return index;
  }

  getLayer(name: string): Layer | undefined {
    const index = this.index.get(name);
    return index === undefined ? undefined : this.layers[index];
  }

  get length(): number {
    return this.layers.length;
  }

  isEmpty(): boolean {
    return this.layers.length === 0;
  }

  hasOcProperties(): boolean {
    return this.ocPropertiesRef !== undefined;
  }

  get ocProperties(): PDFRef | undefined {
    return this.ocPropertiesRef;
  }

  /**
  Register an OCG dictionary for every layer, then the OCProperties
  dictionary that lists them. Call after all layers have been added.
  */
  initialize(document: PDFDocument): void {
    const {context} = document;
    for (const layer of this.layers) {
      layer.ref = context.register(context.obj({
        Type: 'OCG',
        Name: PDFHexString.fromText(layer.name),
      }));
    }
    this.ocPropertiesRef = context.register(this.createOcProperties(document));
  }

  private createOcProperties({context}: PDFDocument): PDFDict {
    const refs = (layers: Layer[]) => {
      const array = PDFArray.withContext(context);
      layers.forEach(({ref}) => {
        if (ref !== undefined) {
          array.push(ref);
        }
      });
      return array;
    };
    const on = this.layers.filter(layer => layer.defaultVisible);
    const off = this.layers.filter(layer => !layer.defaultVisible);

    const defaults = context.obj({Order: refs(this.layers)});
    if (this.config.baseState !== '') {
      defaults.set(PDFName.of('BaseState'), PDFName.of(this.config.baseState));
    }
    if (on.length > 0) {
      defaults.set(PDFName.of('ON'), refs(on));
    }
    if (off.length > 0) {
      defaults.set(PDFName.of('OFF'), refs(off));
    }
    if (this.config.createPanelUi) {
      defaults.set(PDFName.of('ListMode'), PDFName.of('AllPages'));
    }

    const ocProperties = context.obj({OCGs: refs(this.layers), D: defaults});
    if (this.config.intent.length > 0) {
      ocProperties.set(PDFName.of('Intent'), context.obj(this.config.intent.map(intent => PDFName.of(intent))));
    }
    return ocProperties;
  }

  /**
  Register every layer under the `Properties` category of a page's resources
  as L0, L1, ... and return a map from layer name to tag.
  */
  setupPageResources(resources: PDFDict): Map<string, string> {
    const tags = new Map<string, string>();
    this.layers.forEach((layer, index) => {
      if (layer.ref === undefined) {
        throw new Error(`Layer "${layer.name}" has no OCG; call initialize() first`);
      }
      const tag = `L${index}`;
      addResource(resources, 'Properties', tag, layer.ref);
      layer.tag = tag;
      tags.set(layer.name, tag);
    });
    return tags;
  }

  /**
  Point the document catalog at the OCProperties dictionary; a no-op before
  initialize().
  */
  updateCatalog(document: PDFDocument): void {
    if (this.ocPropertiesRef !== undefined) {
      document.catalog.set(PDFName.of('OCProperties'), this.ocPropertiesRef);
    }
  }
}

/**
Accumulates content operations, wrapping runs of them in `/OC /tag BDC` ...
`EMC` marked-content sections. Only one layer is open at a time.
*/
export class LayerContentBuilder {
  private operations: Operation[] = [];
  private currentLayer?: string;

  get current(): string | undefined {
    return this.currentLayer;
  }

  beginLayer(tag: string): this {
    if (this.currentLayer !== undefined) {
      this.endLayer();
    }
    this.operations.push(beginMarkedContent('OC', tag));
    this.currentLayer = tag;
    return this;
  }

  endLayer(): this {
    if (this.currentLayer !== undefined) {
      this.operations.push(endMarkedContent());
      this.currentLayer = undefined;
    }
    return this;
  }

  addOperation(operation: Operation): this {
    this.operations.push(operation);
    return this;
  }

  addOperations(operations: Operation[]): this {
    this.operations.push(...operations);
    return this;
  }

  /** Closes any open layer */
  build(): Operation[] {
    this.endLayer();
    return this.operations.slice();
  }
}

export const LayerOperations = {
  rectangle,
  fill,
  stroke,
  setFillColorRgb,
  setStrokeColorRgb,
  setFillColorGray,
  beginText,
  endText,
  setFont,
  textPosition: moveText,
  showText,
};
