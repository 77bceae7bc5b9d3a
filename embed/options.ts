import {logger} from '../logger';
import {ClipBounds, LayoutRequest} from '../layout/engine';
import {PageRange, allPages} from '../layout/selection';
import {FirstPageOnly, LayoutStrategy} from '../layout/strategies';

/**
Clamp `value` to [min, max]; NaN takes `fallback`.
*/
function clamp(value: number, min: number, max: number, fallback: number): number {
  if (Number.isNaN(value)) {
    logger.warning(`NaN is not a valid setting; using ${fallback}`);
    return fallback;
  }
  return Math.max(min, Math.min(max, value));
}

/**
Options for one embed call. Instances are immutable: every `with*` method
returns a new EmbedOptions.

    new EmbedOptions().withPosition(50, 400).withMaxSize(200, 300)
*/
export class EmbedOptions implements LayoutRequest {
  readonly x: number = 0;
  readonly y: number = 0;
  readonly scaleX: number = 1;
  readonly scaleY: number = 1;
  readonly maxWidth?: number;
  readonly maxHeight?: number;
  readonly preserveAspectRatio: boolean = true;
  readonly layout: LayoutStrategy = new FirstPageOnly();
  readonly rotation: number = 0;
  readonly opacity: number = 1;
  readonly clipBounds?: ClipBounds;
  readonly pageRange: PageRange = allPages();

  constructor(fields: Partial<LayoutRequest> = {}) {
    Object.assign(this, fields);
    this.opacity = clamp(this.opacity, 0, 1, 1);
  }

  private copy(fields: Partial<LayoutRequest>): EmbedOptions {
    return new EmbedOptions({...this.fields(), ...fields});
  }

  fields(): LayoutRequest {
    const {x, y, scaleX, scaleY, maxWidth, maxHeight, preserveAspectRatio, layout, rotation, opacity, clipBounds, pageRange} = this;
    return {x, y, scaleX, scaleY, maxWidth, maxHeight, preserveAspectRatio, layout, rotation, opacity, clipBounds, pageRange};
  }

  withPosition(x: number, y: number): EmbedOptions {
    return this.copy({x, y});
  }

  withScale(scale: number): EmbedOptions {
    return this.copy({scaleX: scale, scaleY: scale});
  }

  withScaleXY(scaleX: number, scaleY: number): EmbedOptions {
    return this.copy({scaleX, scaleY});
  }

  withMaxSize(maxWidth: number, maxHeight: number): EmbedOptions {
    return this.copy({maxWidth, maxHeight});
  }

  withMaxWidth(maxWidth: number): EmbedOptions {
    return this.copy({maxWidth});
  }

  withMaxHeight(maxHeight: number): EmbedOptions {
    return this.copy({maxHeight});
  }

  withPreserveAspectRatio(preserveAspectRatio: boolean): EmbedOptions {
    return this.copy({preserveAspectRatio});
  }

  withLayout(layout: LayoutStrategy): EmbedOptions {
    return this.copy({layout});
  }

  withRotation(rotation: number): EmbedOptions {
    return this.copy({rotation});
  }

  withOpacity(opacity: number): EmbedOptions {
    return this.copy({opacity});
  }

  withClipBounds(x: number, y: number, width: number, height: number): EmbedOptions {
    return this.copy({clipBounds: {x, y, width, height}});
  }

  withPageRange(pageRange: PageRange): EmbedOptions {
    return this.copy({pageRange});
  }
}

// presets

export function watermarkOptions(opacity: number, scale: number): EmbedOptions {
  return new EmbedOptions()
    .withOpacity(opacity)
    .withScale(scale)
    .withPosition(100, 100)
    .withRotation(45);
}

export function thumbnailOptions(x: number, y: number, size: number): EmbedOptions {
  return new EmbedOptions()
    .withPosition(x, y)
    .withMaxSize(size, size);
}

export function fullPageOptions(pageWidth: number, pageHeight: number): EmbedOptions {
  return new EmbedOptions()
    .withMaxSize(pageWidth, pageHeight);
}
