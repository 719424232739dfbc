export * from "./types";
export { normalizeImage, fitWithin, flattenToRgb, resizeWithin } from "./normalizer";
export {
  applyOrientation,
  isOrientationTag,
  orientationOperations,
  orientedSize,
  readOrientation,
} from "./orientation";
export { buildCaptureExif, readCaptureMetadata, type CaptureExif } from "./exif";
