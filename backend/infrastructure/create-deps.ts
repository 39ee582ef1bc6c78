/**
 * 依赖工厂：组装生成画册用例所需的端口与服务实现
 */
import type { BuildPictureBookUseCaseDeps } from '../application/book/build-picture-book-use-case.js';
import { getBookFilesystem, listImages } from '../services/fs.js';
import { getLogManager } from '../services/log-manager.js';
import type { LogManager } from '../services/log-manager.js';
import { LatexCompiler } from './document/latex-compiler.js';
import type { LatexCompilerOptions } from './document/latex-compiler.js';
import { LatexEmitter } from './document/latex-emitter.js';
import { SharpMetadataProvider } from './images/sharp-metadata-provider.js';

export interface CreateBuildDepsOptions {
  logManager?: LogManager;
  compiler?: LatexCompilerOptions;
}

export function createBuildPictureBookDeps(options: CreateBuildDepsOptions = {}): BuildPictureBookUseCaseDeps {
  const logManager = options.logManager ?? getLogManager();
  return {
    metadataProvider: new SharpMetadataProvider(),
    emitter: new LatexEmitter(),
    compiler: new LatexCompiler(options.compiler),
    listImages,
    writeOutput: (outputDirectory, fileName, content) => getBookFilesystem(outputDirectory).writeFile(fileName, content),
    logSystem: (level, message, meta) => logManager.logSystem(level, message, meta),
    logRun: (runId, payload) => logManager.logRun(runId, payload),
  };
}
