import { InvalidImageDimensions } from './errors.js';
import type { PrintSize } from './types.js';

/** 像素换算英寸时使用的基准密度 */
export const BASE_DPI = 96;

/** 超出可用区域时额外收缩的安全系数 */
export const OVERFLOW_SAFETY = 0.95;

export const MIN_SCALING_FACTOR = 0.1;
export const MAX_SCALING_FACTOR = 1.0;

/**
 * 像素尺寸 → 打印尺寸（英寸）。
 * 先按 baseDpi 得到名义尺寸并乘以 scalingFactor；任一边超出可用区域时，
 * 取两边比例中较小者再乘 0.95，统一缩放。宽高始终同比缩放。
 * scalingFactor 由调用方保证在 [0.1, 1.0] 内。
 */
export function resolveSize(
  pixelWidth: number,
  pixelHeight: number,
  usableWidth: number,
  usableHeight: number,
  scalingFactor: number,
  baseDpi: number = BASE_DPI
): PrintSize {
  if (!isPositiveFinite(pixelWidth) || !isPositiveFinite(pixelHeight)) {
    throw new InvalidImageDimensions(pixelWidth, pixelHeight);
  }

  const scaledWidth = (pixelWidth / baseDpi) * scalingFactor;
  const scaledHeight = (pixelHeight / baseDpi) * scalingFactor;

  if (scaledWidth <= usableWidth && scaledHeight <= usableHeight) {
    return { widthIn: scaledWidth, heightIn: scaledHeight, scale: scalingFactor };
  }

  const fit = Math.min(usableWidth / scaledWidth, usableHeight / scaledHeight) * OVERFLOW_SAFETY;
  return {
    widthIn: scaledWidth * fit,
    heightIn: scaledHeight * fit,
    scale: scalingFactor * fit,
  };
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}
