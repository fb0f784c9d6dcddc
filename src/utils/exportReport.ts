import type { InterpretationTier } from '../types/questions';
import type { ImageSource, ReportBlock } from '../types/report';
import { isPdf, loadAsset, toImageSource } from './assets';
import { buildBarChartModel, renderChartImage, type CanvasFactory } from './charts';
import { selectInterpretation } from './interpretation';
import { getLogger } from './logger';
import { DEFAULT_LAYOUT, type LayoutOptions } from './reportLayout';
import { renderReportPdf } from './reportPdf';
import { subsectionsOf, type ScoreResult } from './scoring';

export const RESULTS_FILE_NAME = 'assessment_results.pdf';
export const GUIDE_FILE_NAME = 'allyship_guide.pdf';
const PDF_MIME = 'application/pdf';

export type ReportWarning = 'logo-missing' | 'logo-unreadable' | 'charts-unavailable';

interface ReportContentOptions {
  title: string;
  score: ScoreResult;
  tiers: readonly InterpretationTier[];
  logo?: ImageSource;
  charts: readonly ImageSource[];
}

export interface GenerateResultsOptions {
  title: string;
  score: ScoreResult;
  tiers: readonly InterpretationTier[];
  logoUrl: string;
  layout?: LayoutOptions;
  createCanvas?: CanvasFactory;
}

export interface GeneratedResults {
  bytes: Uint8Array;
  warnings: ReportWarning[];
}

const log = getLogger().child({ module: 'exportReport' });

/**
 * Header, one score line per category, the interpretive tier for the total
 * score, then the chart gallery.
 */
export const buildReportBlocks = ({ title, score, tiers, logo, charts }: ReportContentOptions): ReportBlock[] => {
  const blocks: ReportBlock[] = [{ kind: 'header', logo, title }];

  for (const category of score.perCategory.values()) {
    blocks.push({ kind: 'scoreLine', label: category.category, raw: category.raw, max: category.max });
  }

  const tier = selectInterpretation(score.totalScore, tiers);
  if (tier) {
    blocks.push({ kind: 'text', content: tier.title, emphasis: 'heading' });
    blocks.push({ kind: 'text', content: tier.text, emphasis: 'regular' });
  }

  for (const image of charts) {
    blocks.push({ kind: 'image', image });
  }
  return blocks;
};

/** One bar chart per category, each bar a subsection percentage. */
export const renderCategoryCharts = (score: ScoreResult, createCanvas?: CanvasFactory): ImageSource[] => {
  const charts: ImageSource[] = [];
  for (const category of score.perCategory.keys()) {
    const model = buildBarChartModel(category, subsectionsOf(score, category));
    const image = renderChartImage(model, createCanvas);
    if (image) charts.push(image);
  }
  return charts;
};

/**
 * Builds the downloadable results document. A missing or unreadable logo and
 * an environment without canvas support degrade the document and are
 * reported as warnings.
 */
export const generateResultsPdf = async (options: GenerateResultsOptions): Promise<GeneratedResults> => {
  const warnings: ReportWarning[] = [];

  let logo: ImageSource | undefined;
  const logoAsset = await loadAsset(options.logoUrl);
  if (!logoAsset.ok) {
    warnings.push('logo-missing');
  } else {
    logo = toImageSource(logoAsset.bytes);
    if (!logo) {
      log.warn('Logo is not a PNG image, continuing without it', { url: options.logoUrl });
      warnings.push('logo-unreadable');
    }
  }

  const charts = renderCategoryCharts(options.score, options.createCanvas);
  if (charts.length < options.score.perCategory.size) {
    log.warn('Chart images unavailable', { rendered: charts.length, expected: options.score.perCategory.size });
    warnings.push('charts-unavailable');
  }

  const blocks = buildReportBlocks({ title: options.title, score: options.score, tiers: options.tiers, logo, charts });
  const rendered = await renderReportPdf(blocks, options.layout ?? DEFAULT_LAYOUT, options.title);
  if (rendered.droppedImages > 0) {
    log.info('Chart images beyond the page budget were left out', { dropped: rendered.droppedImages });
  }
  log.debug('Results document generated', { pages: rendered.pageCount, bytes: rendered.bytes.length });

  return { bytes: rendered.bytes, warnings };
};

/**
 * Offers bytes to the user as a file download. The object URL is revoked on
 * every path, including when the click throws.
 */
export const triggerDownload = (bytes: Uint8Array, fileName: string, mime: string = PDF_MIME): void => {
  const data = new Uint8Array(bytes.length);
  data.set(bytes);
  const blob = new Blob([data], { type: mime });
  const url = URL.createObjectURL(blob);
  try {
    const a = document.createElement('a');
    a.href = url;
    a.download = fileName;
    a.click();
  } finally {
    URL.revokeObjectURL(url);
  }
};

export const exportResultsPdf = async (options: GenerateResultsOptions): Promise<ReportWarning[]> => {
  const { bytes, warnings } = await generateResultsPdf(options);
  triggerDownload(bytes, RESULTS_FILE_NAME);
  return warnings;
};

/**
 * Serves the pre-made guide unchanged. Returns false when the file cannot be
 * found or what came back is not a PDF.
 */
export const downloadStaticGuide = async (url: string): Promise<boolean> => {
  const asset = await loadAsset(url);
  if (!asset.ok) return false;
  if (!isPdf(asset.bytes)) {
    log.warn('Guide is not a PDF document', { url });
    return false;
  }
  triggerDownload(asset.bytes, GUIDE_FILE_NAME);
  return true;
};
