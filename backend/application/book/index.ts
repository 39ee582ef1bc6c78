export { buildPictureBookUseCase } from './build-picture-book-use-case.js';
export type {
  BuildPictureBookUseCaseDeps,
  BuildPictureBookUseCaseParams,
  BuildPictureBookUseCaseResult,
  ImageWarning,
} from './build-picture-book-use-case.js';
