import type { ImageRecord } from './types.js';

/**
 * 按时间戳升序排序（稳定排序，同一时间戳保持输入顺序）。返回新数组，不修改入参。
 */
export function orderImages<T extends Pick<ImageRecord, 'timestamp'>>(images: readonly T[]): T[] {
  return images
    .map((image, index) => ({ image, index }))
    .sort((a, b) => a.image.timestamp - b.image.timestamp || a.index - b.index)
    .map(({ image }) => image);
}
