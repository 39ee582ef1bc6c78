/**
 * 画册错误分类
 * - ConfigurationError：配置错误，致命，排版前直接抛出
 * - InvalidImageDimensions / UnreadableImage：单张图片问题，调用方记录警告后跳过该图
 */

export type PictureBookErrorCode = 'CONFIGURATION_ERROR' | 'INVALID_IMAGE_DIMENSIONS' | 'UNREADABLE_IMAGE';

export class PictureBookError extends Error {
  constructor(
    readonly code: PictureBookErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'PictureBookError';
  }
}

export class ConfigurationError extends PictureBookError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidImageDimensions extends PictureBookError {
  constructor(
    readonly pixelWidth: number,
    readonly pixelHeight: number,
    filename?: string
  ) {
    super(
      'INVALID_IMAGE_DIMENSIONS',
      `Invalid image dimensions ${pixelWidth}x${pixelHeight}${filename ? ` for ${filename}` : ''}`
    );
    this.name = 'InvalidImageDimensions';
  }
}

export class UnreadableImage extends PictureBookError {
  constructor(
    readonly filePath: string,
    reason: string
  ) {
    super('UNREADABLE_IMAGE', `Cannot read image ${filePath}: ${reason}`);
    this.name = 'UnreadableImage';
  }
}

export function isPictureBookError(error: unknown): error is PictureBookError {
  return error instanceof PictureBookError;
}
