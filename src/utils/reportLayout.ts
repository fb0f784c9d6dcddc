import type {
  FontWeight,
  ImageSource,
  LaidOutPage,
  PlacedItem,
  ReportBlock,
  ReportLayout,
  TextEmphasis,
  TextMeasurer
} from '../types/report';
import { toPercentage } from './scoring';
import { splitParagraphs, wrapText } from './textWrap';

export interface LayoutOptions {
  pageWidth: number;
  pageHeight: number;
  margin: number;
  bodySize: number;
  headingSize: number;
  titleSize: number;
  lineHeight: number; // multiple of the font size
  blockGap: number;
  logoWidth: number;
  imagesPerPage: number;
  maxImagePages: number;
  imageWidthFraction: number; // share of the content width
  imageGap: number;
}

// A4 in PDF points
export const DEFAULT_LAYOUT: LayoutOptions = {
  pageWidth: 595.28,
  pageHeight: 841.89,
  margin: 50,
  bodySize: 11,
  headingSize: 14,
  titleSize: 18,
  lineHeight: 1.4,
  blockGap: 8,
  logoWidth: 120,
  imagesPerPage: 2,
  maxImagePages: 3,
  imageWidthFraction: 0.9,
  imageGap: 20
};

export const formatScoreLine = (label: string, raw: number, max: number): string =>
  `${label}: ${raw} out of ${max} (${toPercentage(raw, max)}%)`;

const fontFor = (emphasis: TextEmphasis, options: LayoutOptions): { size: number; weight: FontWeight } => {
  switch (emphasis) {
    case 'heading':
      return { size: options.headingSize, weight: 'bold' };
    case 'bold':
      return { size: options.bodySize, weight: 'bold' };
    default:
      return { size: options.bodySize, weight: 'regular' };
  }
};

class PageCursor {
  readonly pages: LaidOutPage[] = [];
  private page: LaidOutPage = { items: [] };
  y: number;

  constructor(private readonly options: LayoutOptions) {
    this.pages.push(this.page);
    this.y = options.margin;
  }

  get pageIsEmpty(): boolean {
    return this.page.items.length === 0;
  }

  get atTop(): boolean {
    return this.y === this.options.margin;
  }

  startPage(): void {
    this.page = { items: [] };
    this.pages.push(this.page);
    this.y = this.options.margin;
  }

  // Content taller than a whole page is placed anyway rather than paging forever.
  ensureRoom(height: number): void {
    if (this.y + height > this.options.pageHeight - this.options.margin && !this.pageIsEmpty) {
      this.startPage();
    }
  }

  place(item: PlacedItem): void {
    this.page.items.push(item);
  }
}

/**
 * Lays out report blocks on fixed-size pages. Text flows from the top margin
 * and breaks onto a new page at the bottom margin. The first image starts a
 * fresh page, after which images fill fixed slots, `imagesPerPage` to a page,
 * for at most `maxImagePages` pages; further images are dropped and counted.
 */
export const layoutReport = (
  blocks: readonly ReportBlock[],
  measurer: TextMeasurer,
  options: LayoutOptions = DEFAULT_LAYOUT
): ReportLayout => {
  const contentWidth = options.pageWidth - options.margin * 2;
  const cursor = new PageCursor(options);

  let previous: ReportBlock['kind'] | undefined;
  let galleryPages = 0;
  let imagesOnPage = 0;
  let droppedImages = 0;

  const placeLines = (text: string, size: number, weight: FontWeight) => {
    const lineHeight = size * options.lineHeight;
    const lines = wrapText(text, contentWidth, (line) => measurer.widthOf(line, size, weight));
    for (const line of lines) {
      cursor.ensureRoom(lineHeight);
      cursor.place({ kind: 'text', text: line, x: options.margin, y: cursor.y, size, weight });
      cursor.y += lineHeight;
    }
  };

  const placeLogo = (logo: ImageSource) => {
    const width = Math.min(options.logoWidth, contentWidth);
    const height = width / logo.aspectRatio;
    cursor.ensureRoom(height);
    cursor.place({ kind: 'image', image: logo, x: options.margin, y: cursor.y, width, height });
    cursor.y += height + options.blockGap;
  };

  const placeGalleryImage = (image: ImageSource) => {
    if (galleryPages === 0) {
      if (!cursor.pageIsEmpty) cursor.startPage();
      galleryPages = 1;
      imagesOnPage = 0;
    } else if (imagesOnPage === options.imagesPerPage) {
      if (galleryPages >= options.maxImagePages) {
        droppedImages += 1;
        return;
      }
      cursor.startPage();
      galleryPages += 1;
      imagesOnPage = 0;
    }

    const slotHeight =
      (options.pageHeight - options.margin * 2 - options.imageGap * (options.imagesPerPage - 1)) /
      options.imagesPerPage;
    let width = contentWidth * options.imageWidthFraction;
    let height = width / image.aspectRatio;
    if (height > slotHeight) {
      height = slotHeight;
      width = height * image.aspectRatio;
    }
    const y = options.margin + imagesOnPage * (slotHeight + options.imageGap);
    cursor.place({ kind: 'image', image, x: options.margin + (contentWidth - width) / 2, y, width, height });
    cursor.y = y + height + options.imageGap;
    imagesOnPage += 1;
  };

  for (const block of blocks) {
    if (block.kind !== 'image' && galleryPages > 0) {
      // Content after the gallery continues on a page of its own.
      cursor.startPage();
      galleryPages = 0;
    }
    const consecutiveScoreLine = block.kind === 'scoreLine' && previous === 'scoreLine';
    if (block.kind !== 'image' && previous !== undefined && !consecutiveScoreLine && !cursor.atTop) {
      cursor.y += options.blockGap;
    }

    switch (block.kind) {
      case 'header':
        if (block.logo) placeLogo(block.logo);
        placeLines(block.title, options.titleSize, 'bold');
        break;
      case 'scoreLine':
        placeLines(formatScoreLine(block.label, block.raw, block.max), options.bodySize, 'regular');
        break;
      case 'text': {
        const { size, weight } = fontFor(block.emphasis, options);
        const paragraphs = splitParagraphs(block.content);
        paragraphs.forEach((paragraph, index) => {
          if (index > 0) cursor.y += options.blockGap;
          placeLines(paragraph, size, weight);
        });
        break;
      }
      case 'image':
        placeGalleryImage(block.image);
        break;
    }
    previous = block.kind;
  }

  return { pages: cursor.pages, droppedImages };
};
