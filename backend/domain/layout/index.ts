export type {
  ImageRecord,
  Page,
  PageGeometry,
  PageOrientation,
  PageSizeClass,
  PerPagePolicy,
  PlacedImage,
  PrintSize,
} from './types.js';
export { GREEDY_POLICY } from './types.js';
export {
  ConfigurationError,
  InvalidImageDimensions,
  PictureBookError,
  UnreadableImage,
  isPictureBookError,
} from './errors.js';
export type { PictureBookErrorCode } from './errors.js';
export {
  PAGE_MARGIN_IN,
  PAGE_ORIENTATIONS,
  PAGE_SIZES,
  PAGE_SIZE_CLASSES,
  computeUsablePage,
  isPageOrientation,
  isPageSizeClass,
} from './page-geometry.js';
export { BASE_DPI, MAX_SCALING_FACTOR, MIN_SCALING_FACTOR, OVERFLOW_SAFETY, resolveSize } from './image-sizer.js';
export { orderImages } from './image-orderer.js';
export { layoutPages, sizingHeightFor } from './page-layout-engine.js';
export { CAPTION_LEADING, POINTS_PER_INCH, captionBaselineSkipPt, captionHeightIn } from './caption.js';
