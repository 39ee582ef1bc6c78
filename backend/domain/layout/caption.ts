/** TeX 点（pt）每英寸 */
export const POINTS_PER_INCH = 72.27;

/** 标题行距 = 字号 × 1.2，取整到 pt */
export const CAPTION_LEADING = 1.2;

export function captionBaselineSkipPt(captionFontSizePt: number): number {
  return Math.round(captionFontSizePt * CAPTION_LEADING);
}

/** 每张图片下方文件名标题占用的竖直高度（英寸） */
export function captionHeightIn(captionFontSizePt: number): number {
  return captionBaselineSkipPt(captionFontSizePt) / POINTS_PER_INCH;
}
