import { describe, it, expect } from 'vitest';
import { LatexEmitter, escapeLatex, formatInches } from '../../../backend/infrastructure/document/latex-emitter.js';
import { computeUsablePage, layoutPages } from '../../../backend/domain/layout/index.js';
import type { PlacedImage } from '../../../backend/domain/layout/index.js';

function placed(filename: string, widthIn: number, heightIn: number): PlacedImage {
  return {
    filename,
    path: `/photos/trip/${filename}`,
    pixelWidth: widthIn * 96,
    pixelHeight: heightIn * 96,
    timestamp: 0,
    widthIn,
    heightIn,
    scale: 1,
  };
}

const HEADER = [
  String.raw`\documentclass{article}`,
  '\\usepackage{graphicx}',
  '\\usepackage[utf8]{inputenc}',
  '\\usepackage[margin=0.500in]{geometry}',
  String.raw`\geometry{paperwidth=8.500in,paperheight=11.000in}`,
  String.raw`\graphicspath{{/photos/trip/}}`,
  String.raw`\pagestyle{empty}`,
  String.raw`\begin{document}`,
  '',
];

describe('escapeLatex', () => {
  it('escapes underscores and the usual special characters', () => {
    expect(escapeLatex('my_photo&co 100%.png')).toBe(String.raw`my\_photo\&co 100\%.png`);
    expect(escapeLatex('$#{}')).toBe(String.raw`\$\#\{\}`);
  });

  it('uses text commands for tilde, caret and backslash', () => {
    expect(escapeLatex('a~b^c\\d')).toBe(String.raw`a\textasciitilde{}b\textasciicircum{}c\textbackslash{}d`);
  });

  it('leaves plain names untouched', () => {
    expect(escapeLatex('IMG-0001.jpg')).toBe('IMG-0001.jpg');
  });
});

describe('formatInches', () => {
  it('prints three decimals', () => {
    expect(formatInches(7.125)).toBe('7.125in');
    expect(formatInches(2)).toBe('2.000in');
  });
});

describe('LatexEmitter', () => {
  const emitter = new LatexEmitter();
  const geometry = computeUsablePage('letter', 'portrait');

  it('renders one center block per page with captions and spacing', () => {
    const pages = layoutPages([placed('a_1.png', 2, 1), placed('b.png', 3, 1.5)], geometry.usableHeight, 0.3);
    const source = emitter.render({
      pages,
      geometry,
      imageDirectory: '/photos/trip/',
      imageSpacingIn: 0.3,
      captionFontSizePt: 8,
    });

    expect(source).toBe(
      [
        ...HEADER,
        String.raw`\begin{center}`,
        String.raw`\includegraphics[width=2.000in,height=1.000in]{a_1.png}\\`,
        String.raw`{\fontsize{8}{10}\selectfont\texttt{a\_1.png}}`,
        String.raw`\vspace{0.300in}`,
        '',
        String.raw`\includegraphics[width=3.000in,height=1.500in]{b.png}\\`,
        String.raw`{\fontsize{8}{10}\selectfont\texttt{b.png}}`,
        String.raw`\end{center}`,
        String.raw`\clearpage`,
        '',
        String.raw`\end{document}`,
        '',
      ].join('\n')
    );
  });

  it('emits a clearpage per page', () => {
    const pages = layoutPages([placed('a.png', 7, 9), placed('b.png', 7, 9), placed('c.png', 7, 9)], 10, 0.3);
    const source = emitter.render({ pages, geometry, imageDirectory: '/photos/trip', imageSpacingIn: 0.3, captionFontSizePt: 10 });
    expect(source.match(/\\clearpage/g)).toHaveLength(3);
    expect(source).toContain(String.raw`{\fontsize{10}{12}\selectfont\texttt{c.png}}`);
  });

  it('renders an empty document body when there are no pages', () => {
    const source = emitter.render({ pages: [], geometry, imageDirectory: '/photos/trip', imageSpacingIn: 0.3, captionFontSizePt: 8 });
    expect(source).toBe([...HEADER, String.raw`\end{document}`, ''].join('\n'));
  });

  it('writes landscape paper dimensions', () => {
    const landscape = computeUsablePage('a4', 'landscape');
    const source = emitter.render({ pages: [], geometry: landscape, imageDirectory: 'C:\\photos', imageSpacingIn: 0.3, captionFontSizePt: 8 });
    expect(source).toContain(String.raw`\geometry{paperwidth=11.690in,paperheight=8.270in}`);
    expect(source).toContain(String.raw`\graphicspath{{C:/photos/}}`);
  });
});
