/**
 * LaTeX 编译（依赖系统 pdflatex）：连续运行两遍，输出到 .tex 所在目录
 */
import { spawn } from 'child_process';
import path from 'path';
import type { DocumentCompilerPort } from '../../domain/document/ports/document-emitter-port.js';

const PDFLATEX_MISSING_MSG =
  'pdflatex not found. Install a TeX distribution first (e.g. Debian/Ubuntu: apt install texlive-latex-base texlive-latex-extra, macOS: brew install --cask mactex).';

const DEFAULT_PASSES = 2;

export interface LatexCompilerOptions {
  command?: string;
  passes?: number;
}

function runOnce(command: string, texPath: string): Promise<void> {
  const outputDir = path.dirname(texPath);
  return new Promise((resolve, reject) => {
    let settled = false;
    const finish = () => {
      if (!settled) {
        settled = true;
        resolve();
      }
    };
    const fail = (err: Error) => {
      if (!settled) {
        settled = true;
        reject(err);
      }
    };

    const proc = spawn(command, ['-interaction=nonstopmode', '-output-directory', outputDir, texPath], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        fail(new Error(PDFLATEX_MISSING_MSG));
      } else {
        fail(err);
      }
    });
    proc.on('close', (code) => {
      if (code === 0) {
        finish();
        return;
      }
      fail(
        new Error(
          `LaTeX compilation failed (exit code ${code}).\n${stderr.trim()}\n\nStandard output:\n${stdout.trim()}`
        )
      );
    });
  });
}

export class LatexCompiler implements DocumentCompilerPort {
  private readonly command: string;
  private readonly passes: number;

  constructor(options: LatexCompilerOptions = {}) {
    this.command = options.command ?? 'pdflatex';
    this.passes = options.passes ?? DEFAULT_PASSES;
  }

  async compile(texPath: string): Promise<string> {
    const absPath = path.resolve(texPath);
    for (let pass = 0; pass < this.passes; pass++) {
      await runOnce(this.command, absPath);
    }
    return path.join(path.dirname(absPath), `${path.basename(absPath, path.extname(absPath))}.pdf`);
  }
}
