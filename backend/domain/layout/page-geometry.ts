import { ConfigurationError } from './errors.js';
import type { PageGeometry, PageOrientation, PageSizeClass } from './types.js';

/** 纵向纸张尺寸（英寸） */
export const PAGE_SIZES: Readonly<Record<PageSizeClass, { width: number; height: number }>> = {
  letter: { width: 8.5, height: 11 },
  a4: { width: 8.27, height: 11.69 },
  legal: { width: 8.5, height: 14 },
};

export const PAGE_MARGIN_IN = 0.5;

export const PAGE_SIZE_CLASSES: readonly PageSizeClass[] = ['letter', 'a4', 'legal'];
export const PAGE_ORIENTATIONS: readonly PageOrientation[] = ['portrait', 'landscape'];

export function isPageSizeClass(value: string): value is PageSizeClass {
  return Object.prototype.hasOwnProperty.call(PAGE_SIZES, value);
}

export function isPageOrientation(value: string): value is PageOrientation {
  return value === 'portrait' || value === 'landscape';
}

/**
 * 由纸张规格 + 方向计算可用区域。横向先交换宽高，再两边各减去页边距。
 * 未知规格或方向直接抛 ConfigurationError，不做默认回退。
 */
export function computeUsablePage(
  pageSizeClass: string,
  orientation: string,
  marginIn: number = PAGE_MARGIN_IN
): PageGeometry {
  if (!isPageSizeClass(pageSizeClass)) {
    throw new ConfigurationError(
      `Unknown page size "${pageSizeClass}", expected one of: ${PAGE_SIZE_CLASSES.join(', ')}`
    );
  }
  if (!isPageOrientation(orientation)) {
    throw new ConfigurationError(
      `Unknown orientation "${orientation}", expected one of: ${PAGE_ORIENTATIONS.join(', ')}`
    );
  }

  const portrait = PAGE_SIZES[pageSizeClass];
  const paperWidth = orientation === 'landscape' ? portrait.height : portrait.width;
  const paperHeight = orientation === 'landscape' ? portrait.width : portrait.height;
  const usableWidth = paperWidth - 2 * marginIn;
  const usableHeight = paperHeight - 2 * marginIn;

  if (usableWidth <= 0 || usableHeight <= 0) {
    throw new ConfigurationError(`Margin ${marginIn}in leaves no usable area on ${pageSizeClass} paper`);
  }

  return {
    pageSizeClass,
    orientation,
    paperWidth,
    paperHeight,
    marginIn,
    usableWidth,
    usableHeight,
  };
}
