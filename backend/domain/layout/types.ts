/**
 * 排版领域类型：图片记录、页面几何、已定尺寸图片、页面
 * 长度单位统一为英寸（in），像素只出现在 ImageRecord 上
 */

export type PageSizeClass = 'letter' | 'a4' | 'legal';
export type PageOrientation = 'portrait' | 'landscape';

/** 读取自图片元数据提供方，读取后不再修改 */
export interface ImageRecord {
  /** 目录内唯一 */
  readonly filename: string;
  readonly path: string;
  readonly pixelWidth: number;
  readonly pixelHeight: number;
  /** 文件修改时间（毫秒） */
  readonly timestamp: number;
}

export interface PageGeometry {
  readonly pageSizeClass: PageSizeClass;
  readonly orientation: PageOrientation;
  readonly paperWidth: number;
  readonly paperHeight: number;
  readonly marginIn: number;
  /** 已减去两侧页边距 */
  readonly usableWidth: number;
  readonly usableHeight: number;
}

export interface PrintSize {
  widthIn: number;
  heightIn: number;
  /** 相对名义尺寸（像素 / baseDpi）的总缩放倍数 */
  scale: number;
}

export interface PlacedImage extends ImageRecord {
  readonly widthIn: number;
  readonly heightIn: number;
  readonly scale: number;
}

export interface Page {
  readonly index: number;
  readonly images: readonly PlacedImage[];
  /** 图片高度 + 间距的累计值 */
  readonly consumedHeight: number;
}

/**
 * 每页图片数策略：greedy 按高度尽量装满；fixed 在高度允许的前提下每页最多 count 张
 * （count = 1 即一图一页，count = 2 即两图一页）
 */
export type PerPagePolicy = { kind: 'greedy' } | { kind: 'fixed'; count: number };

export const GREEDY_POLICY: PerPagePolicy = { kind: 'greedy' };
