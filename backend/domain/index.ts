/**
 * 领域层导出
 */
export * from './layout/index.js';
export type { ImageMetadataPort } from './images/ports/image-metadata-port.js';
export type {
  DocumentCompilerPort,
  DocumentEmitterPort,
  PictureBookDocument,
} from './document/ports/document-emitter-port.js';
