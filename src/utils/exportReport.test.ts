import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import {
  buildReportBlocks,
  downloadStaticGuide,
  generateResultsPdf,
  GUIDE_FILE_NAME,
  RESULTS_FILE_NAME,
  triggerDownload
} from './exportReport';
import type { ChartCanvas } from './charts';
import { computeScore } from './scoring';
import { parseAssessmentDefinition } from './questionCatalog';
import { answerAll, makeRawAssessment, TIERS_4, TINY_PNG_BASE64, tinyPng } from '../test-utils/fixtures';

const assessment = parseAssessmentDefinition(
  makeRawAssessment([
    {
      category: 'Allyship',
      subsections: [
        { name: 'Speak out', questions: 3 },
        { name: 'Amplify voices', questions: 3 }
      ]
    },
    { category: 'Leadership', subsections: [{ name: 'Sponsor others', questions: 3 }] }
  ])
);
const score = computeScore(assessment.questions, answerAll(assessment.questions, 2), 4);

const workingCanvas = (): ChartCanvas => ({
  getContext: () => ({
    fillStyle: '',
    strokeStyle: '',
    font: '',
    textAlign: 'start',
    textBaseline: 'alphabetic',
    lineWidth: 1,
    fillRect: vi.fn(),
    fillText: vi.fn(),
    beginPath: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    stroke: vi.fn()
  }),
  toDataURL: () => `data:image/png;base64,${TINY_PNG_BASE64}`
});

const serveFiles = (files: Record<string, Uint8Array>) =>
  vi.fn(async (url: string) => {
    const body = files[url];
    return body
      ? { ok: true, status: 200, arrayBuffer: async () => body.buffer }
      : { ok: false, status: 404 };
  });

describe('buildReportBlocks', () => {
  it('lists the header, a score line per category, the tier and the charts', () => {
    const chart = { bytes: tinyPng(), aspectRatio: 2.5 };
    const blocks = buildReportBlocks({ title: 'Results', score, tiers: TIERS_4, charts: [chart] });

    expect(blocks).toEqual([
      { kind: 'header', logo: undefined, title: 'Results' },
      { kind: 'scoreLine', label: 'Allyship', raw: 12, max: 24 },
      { kind: 'scoreLine', label: 'Leadership', raw: 6, max: 12 },
      { kind: 'text', content: 'Tier A', emphasis: 'heading' },
      { kind: 'text', content: 'Text A', emphasis: 'regular' },
      { kind: 'image', image: chart }
    ]);
  });
});

describe('generateResultsPdf', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds the document with the logo and one chart per category', async () => {
    vi.stubGlobal('fetch', serveFiles({ '/logo.png': tinyPng() }));

    const { bytes, warnings } = await generateResultsPdf({
      title: 'Results',
      score,
      tiers: TIERS_4,
      logoUrl: '/logo.png',
      createCanvas: workingCanvas
    });
    const pdf = await PDFDocument.load(bytes);

    expect(warnings).toEqual([]);
    expect(pdf.getPageCount()).toBe(2);
  });

  it('continues without a missing logo', async () => {
    vi.stubGlobal('fetch', serveFiles({}));

    const { bytes, warnings } = await generateResultsPdf({
      title: 'Results',
      score,
      tiers: TIERS_4,
      logoUrl: '/logo.png',
      createCanvas: workingCanvas
    });

    expect(warnings).toEqual(['logo-missing']);
    expect((await PDFDocument.load(bytes)).getPageCount()).toBe(2);
  });

  it('warns about a logo that is not a PNG and about missing chart support', async () => {
    vi.stubGlobal('fetch', serveFiles({ '/logo.png': new TextEncoder().encode('GIF89a') }));

    const { bytes, warnings } = await generateResultsPdf({
      title: 'Results',
      score,
      tiers: TIERS_4,
      logoUrl: '/logo.png',
      createCanvas: () => ({ getContext: () => null, toDataURL: () => '' })
    });

    expect(warnings).toEqual(['logo-unreadable', 'charts-unavailable']);
    expect((await PDFDocument.load(bytes)).getPageCount()).toBe(1);
  });
});

describe('downloads', () => {
  const downloaded: string[] = [];
  const createObjectURL = vi.fn(() => 'blob:results');
  const revokeObjectURL = vi.fn();

  beforeEach(() => {
    downloaded.length = 0;
    createObjectURL.mockClear();
    revokeObjectURL.mockClear();
    URL.createObjectURL = createObjectURL;
    URL.revokeObjectURL = revokeObjectURL;
    vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(function (this: HTMLAnchorElement) {
      downloaded.push(this.download);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it('offers the bytes under the given file name and releases the URL', () => {
    triggerDownload(new Uint8Array([1, 2, 3]), RESULTS_FILE_NAME);

    expect(downloaded).toEqual(['assessment_results.pdf']);
    expect(createObjectURL).toHaveBeenCalledTimes(1);
    expect(revokeObjectURL).toHaveBeenCalledWith('blob:results');
  });

  it('releases the URL when the click fails', () => {
    vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(() => {
      throw new Error('blocked');
    });

    expect(() => triggerDownload(new Uint8Array([1]), RESULTS_FILE_NAME)).toThrow('blocked');
    expect(revokeObjectURL).toHaveBeenCalledWith('blob:results');
  });

  it('serves the static guide when it exists', async () => {
    vi.stubGlobal('fetch', serveFiles({ '/allyship_guide.pdf': new TextEncoder().encode('%PDF-1.4') }));

    expect(await downloadStaticGuide('/allyship_guide.pdf')).toBe(true);
    expect(downloaded).toEqual([GUIDE_FILE_NAME]);
  });

  it('treats an HTML fallback page as a missing guide', async () => {
    vi.stubGlobal(
      'fetch',
      serveFiles({ '/allyship_guide.pdf': new TextEncoder().encode('<!doctype html><html><body></body></html>') })
    );

    expect(await downloadStaticGuide('/allyship_guide.pdf')).toBe(false);
    expect(downloaded).toEqual([]);
  });

  it('reports a missing guide without downloading anything', async () => {
    vi.stubGlobal('fetch', serveFiles({}));

    expect(await downloadStaticGuide('/allyship_guide.pdf')).toBe(false);
    expect(downloaded).toEqual([]);
  });
});
