/**
 * LaTeX 输出端：每页一个 center 块，图片下方是等宽字体的文件名标题，页与页之间 \clearpage
 */
import type { DocumentEmitterPort, PictureBookDocument } from '../../domain/document/ports/document-emitter-port.js';
import { captionBaselineSkipPt } from '../../domain/layout/caption.js';
import type { PlacedImage } from '../../domain/layout/types.js';

const LATEX_SPECIAL_CHARS: Readonly<Record<string, string>> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  $: '\\$',
  '#': '\\#',
  _: '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}',
};

/** 转义文件名中的 LaTeX 特殊字符（用于标题文本，不用于 \includegraphics 参数） */
export function escapeLatex(text: string): string {
  return text.replace(/[\\&%$#_{}~^]/g, (ch) => LATEX_SPECIAL_CHARS[ch] ?? ch);
}

export function formatInches(value: number): string {
  return `${value.toFixed(3)}in`;
}

function renderImage(image: PlacedImage, captionFontSizePt: number): string[] {
  const baselineSkip = captionBaselineSkipPt(captionFontSizePt);
  return [
    `\\includegraphics[width=${formatInches(image.widthIn)},height=${formatInches(image.heightIn)}]{${image.filename}}\\\\`,
    `{\\fontsize{${captionFontSizePt}}{${baselineSkip}}\\selectfont\\texttt{${escapeLatex(image.filename)}}}`,
  ];
}

export class LatexEmitter implements DocumentEmitterPort {
  readonly extension = 'tex';

  render(document: PictureBookDocument): string {
    const { geometry, pages, imageSpacingIn, captionFontSizePt } = document;
    const graphicsDir = document.imageDirectory.replace(/\\/g, '/').replace(/\/+$/, '');

    const lines: string[] = [
      '\\documentclass{article}',
      '\\usepackage{graphicx}',
      '\\usepackage[utf8]{inputenc}',
      `\\usepackage[margin=${formatInches(geometry.marginIn)}]{geometry}`,
      `\\geometry{paperwidth=${formatInches(geometry.paperWidth)},paperheight=${formatInches(geometry.paperHeight)}}`,
      `\\graphicspath{{${graphicsDir}/}}`,
      '\\pagestyle{empty}',
      '\\begin{document}',
      '',
    ];

    for (const page of pages) {
      lines.push('\\begin{center}');
      page.images.forEach((image, i) => {
        if (i > 0) {
          lines.push(`\\vspace{${formatInches(imageSpacingIn)}}`, '');
        }
        lines.push(...renderImage(image, captionFontSizePt));
      });
      lines.push('\\end{center}', '\\clearpage', '');
    }

    lines.push('\\end{document}', '');
    return lines.join('\n');
  }
}
