import type { ImageRecord } from '../../layout/types.js';

/**
 * 图片元数据端口：读取像素尺寸与修改时间
 * 无法解码时以 UnreadableImage 拒绝
 */
export interface ImageMetadataPort {
  read(filePath: string): Promise<ImageRecord>;
}
