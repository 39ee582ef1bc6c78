/**
 * 图片元数据实现：sharp 读取像素尺寸，fs.stat 取修改时间作为排序键
 * sharp 不支持解码的格式（如 BMP）同样按 UnreadableImage 处理
 */
import { promises as fs } from 'fs';
import path from 'path';
import sharp from 'sharp';
import type { ImageMetadataPort } from '../../domain/images/ports/image-metadata-port.js';
import { UnreadableImage } from '../../domain/layout/errors.js';
import type { ImageRecord } from '../../domain/layout/types.js';
import { errorMessage } from '../../utils/error-message.js';

export class SharpMetadataProvider implements ImageMetadataPort {
  async read(filePath: string): Promise<ImageRecord> {
    const absPath = path.resolve(filePath);

    let mtimeMs: number;
    try {
      const stat = await fs.stat(absPath);
      mtimeMs = stat.mtimeMs;
    } catch (error) {
      throw new UnreadableImage(absPath, errorMessage(error));
    }

    let width: number | undefined;
    let height: number | undefined;
    try {
      const meta = await sharp(absPath).metadata();
      width = meta.width;
      height = meta.height;
    } catch (error) {
      throw new UnreadableImage(absPath, errorMessage(error));
    }

    if (width === undefined || height === undefined) {
      throw new UnreadableImage(absPath, 'missing width/height in image header');
    }

    return {
      filename: path.basename(absPath),
      path: absPath,
      pixelWidth: width,
      pixelHeight: height,
      timestamp: mtimeMs,
    };
  }
}
