import { PDFDocument, PDFFont, PDFImage, StandardFonts, rgb } from 'pdf-lib';
import type { FontWeight, ImageSource, ReportBlock, TextMeasurer } from '../types/report';
import { DEFAULT_LAYOUT, layoutReport, type LayoutOptions } from './reportLayout';

export interface RenderedReport {
  bytes: Uint8Array;
  pageCount: number;
  droppedImages: number;
}

const TEXT_COLOR = rgb(0.14, 0.12, 0.13);

/** Replaces characters the font cannot encode (standard fonts are WinAnsi only). */
export const encodableText = (text: string, charset: ReadonlySet<number>): string =>
  Array.from(text, (ch) => {
    const code = ch.codePointAt(0);
    return code !== undefined && charset.has(code) ? ch : '?';
  }).join('');

/**
 * Lays out the blocks and draws them into a new PDF document.
 * The whole document lives in memory; the returned bytes are final.
 */
export const renderReportPdf = async (
  blocks: readonly ReportBlock[],
  options: LayoutOptions = DEFAULT_LAYOUT,
  title?: string
): Promise<RenderedReport> => {
  const pdf = await PDFDocument.create();
  if (title) pdf.setTitle(title);

  const fonts: Record<FontWeight, PDFFont> = {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold)
  };
  const charsets: Record<FontWeight, ReadonlySet<number>> = {
    regular: new Set(fonts.regular.getCharacterSet()),
    bold: new Set(fonts.bold.getCharacterSet())
  };

  const measurer: TextMeasurer = {
    widthOf: (text, size, weight) => fonts[weight].widthOfTextAtSize(encodableText(text, charsets[weight]), size)
  };

  const layout = layoutReport(blocks, measurer, options);

  const embedded = new Map<ImageSource, PDFImage>();
  const embed = async (image: ImageSource): Promise<PDFImage> => {
    const cached = embedded.get(image);
    if (cached) return cached;
    const pdfImage = await pdf.embedPng(image.bytes);
    embedded.set(image, pdfImage);
    return pdfImage;
  };

  for (const laidOut of layout.pages) {
    const page = pdf.addPage([options.pageWidth, options.pageHeight]);
    for (const item of laidOut.items) {
      if (item.kind === 'text') {
        page.drawText(encodableText(item.text, charsets[item.weight]), {
          x: item.x,
          y: options.pageHeight - item.y - item.size,
          size: item.size,
          font: fonts[item.weight],
          color: TEXT_COLOR
        });
      } else {
        page.drawImage(await embed(item.image), {
          x: item.x,
          y: options.pageHeight - item.y - item.height,
          width: item.width,
          height: item.height
        });
      }
    }
  }

  return { bytes: await pdf.save(), pageCount: layout.pages.length, droppedImages: layout.droppedImages };
};
