import type { Page, PageGeometry } from '../../layout/types.js';

/** 交给文档输出端的完整排版结果 */
export interface PictureBookDocument {
  pages: readonly Page[];
  geometry: PageGeometry;
  /** 图片所在目录（绝对路径） */
  imageDirectory: string;
  imageSpacingIn: number;
  captionFontSizePt: number;
}

/**
 * 文档输出端口：把页面序列渲染为文档源文本，不关心具体格式
 */
export interface DocumentEmitterPort {
  /** 输出文件扩展名（不含点） */
  readonly extension: string;
  render(document: PictureBookDocument): string;
}

/**
 * 文档编译端口：把源文件编译为可查看的产物，返回产物路径
 */
export interface DocumentCompilerPort {
  compile(sourcePath: string): Promise<string>;
}
