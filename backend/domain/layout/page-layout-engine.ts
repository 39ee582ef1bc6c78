import { ConfigurationError } from './errors.js';
import { GREEDY_POLICY } from './types.js';
import type { Page, PerPagePolicy, PlacedImage } from './types.js';

/**
 * 单遍贪心纵向装箱：按输入顺序逐张放置，不回看、不重排。
 *
 * - 当前页为空时无条件放入（单张超高图片也不会被丢弃）
 * - 否则仅当 consumed + h + spacing <= usableHeight 时追加
 * - 放不下（或 fixed 策略已满）则收页，新开一页只放这一张
 *
 * 图片为空时返回空数组。相同输入总是得到相同结果。
 */
export function layoutPages(
  images: readonly PlacedImage[],
  usableHeight: number,
  interImageSpacing: number,
  policy: PerPagePolicy = GREEDY_POLICY
): Page[] {
  const capacity = policy.kind === 'fixed' ? policy.count : Number.POSITIVE_INFINITY;
  const pages: Page[] = [];
  let current: PlacedImage[] = [];
  let consumedHeight = 0;

  const closePage = (): void => {
    pages.push(Object.freeze({ index: pages.length, images: Object.freeze(current), consumedHeight }));
  };

  for (const image of images) {
    const needed = image.heightIn + interImageSpacing;

    if (current.length === 0) {
      current.push(image);
      consumedHeight = needed;
      continue;
    }

    if (current.length < capacity && consumedHeight + needed <= usableHeight) {
      current.push(image);
      consumedHeight += needed;
      continue;
    }

    closePage();
    current = [image];
    consumedHeight = needed;
  }

  if (current.length > 0) closePage();

  return pages;
}

/**
 * 定尺寸时使用的高度上限：greedy 为整页可用高度；
 * fixed 为每个槽位的高度，使 count 张图片连同间距恰好能放进一页。
 */
export function sizingHeightFor(policy: PerPagePolicy, usableHeight: number, interImageSpacing: number): number {
  if (policy.kind === 'greedy') return usableHeight;

  const slot = usableHeight / policy.count - interImageSpacing;
  if (slot <= 0) {
    throw new ConfigurationError(
      `${policy.count} images per page with ${interImageSpacing}in spacing do not fit in ${usableHeight}in`
    );
  }
  return slot;
}
