export {
  AlbumThumbnailBuilder,
  type AlbumThumbnailDependencies,
  type CoinFlip,
  type ThumbnailResult,
} from './module/albumThumbnail/albumThumbnail.service.js';
export {
  type CanvasFactory,
  createSharpCanvas,
  SharpCanvas,
  type ThumbnailCanvas,
} from './module/albumThumbnail/canvas.js';
export {
  composeThumbnail,
  canvasHeightFor,
  type Placement,
} from './module/albumThumbnail/compositor.js';
export {
  type LayoutParameters,
  type RgbColor,
  type ThumbnailConfig,
  type ThumbnailConfigInput,
  ThumbnailConfigSchema,
} from './module/albumThumbnail/config.js';
export {
  createDefaultDecoderRegistry,
  createSharpDecoder,
  DecoderRegistry,
  type ImageDecoder,
} from './module/albumThumbnail/decoder.js';
export {
  AlbumThumbnailError,
  type AlbumThumbnailErrorCode,
} from './module/albumThumbnail/error.js';
export {
  classifyLayout,
  LAYOUT_THRESHOLDS,
  type LayoutChoice,
  type LayoutKind,
  type RatioQuad,
  type RatioTriple,
} from './module/albumThumbnail/layoutClassifier.js';
export {
  computeLayoutPlan,
  layout3A,
  layout4A,
  layout4B,
  layout4C,
  layout4D,
  type LayoutPlan,
  type Rect,
} from './module/albumThumbnail/layoutEngine.js';
export {
  createSourceImage,
  type SourceImage,
} from './module/albumThumbnail/model/sourceImage.js';
export {
  compareByRatio,
  selectSortedQuad,
  sortByRatio,
} from './module/albumThumbnail/ratioSorter.js';
export {
  type AspectRatio,
  AspectRatioSchema,
  type ImageFormat,
} from './module/albumThumbnail/valueObjects.js';
export { initializeSharp, LOW_MEMORY_CONFIG } from './lib/sharpConfig.js';
