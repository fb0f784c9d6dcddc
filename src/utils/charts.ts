import type { ImageSource } from '../types/report';
import type { SubsectionTotals } from './scoring';

export interface ChartBar {
  label: string;
  percentage: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ChartTick {
  value: number;
  x: number;
}

export interface BarChartModel {
  title: string;
  width: number;
  height: number;
  plot: { left: number; top: number; width: number; height: number };
  bars: ChartBar[];
  ticks: ChartTick[];
}

export interface ChartSize {
  width: number;
  height: number;
  labelWidth: number;
}

export const CHART_COLOR = '#377bff';
export const DEFAULT_CHART_SIZE: ChartSize = { width: 1000, height: 400, labelWidth: 360 };

// Bar labels are right-aligned LABEL_GAP left of the plot, so they must fit in labelWidth - LABEL_GAP.
export const LABEL_FONT_SIZE = 20;
export const LABEL_GAP = 12;

const TITLE_HEIGHT = 48;
const AXIS_HEIGHT = 56;
const RIGHT_PAD = 24;
const BAR_FILL = 0.7; // share of each row taken by its bar

/**
 * Horizontal bar chart geometry: one bar per subsection on a 0-100 axis.
 * Shared by the on-screen SVG chart and the canvas painter used for the PDF.
 */
export const buildBarChartModel = (
  title: string,
  subsections: readonly SubsectionTotals[],
  size: ChartSize = DEFAULT_CHART_SIZE
): BarChartModel => {
  const plot = {
    left: size.labelWidth,
    top: TITLE_HEIGHT,
    width: size.width - size.labelWidth - RIGHT_PAD,
    height: size.height - TITLE_HEIGHT - AXIS_HEIGHT
  };
  const rowHeight = subsections.length > 0 ? plot.height / subsections.length : plot.height;
  const barHeight = rowHeight * BAR_FILL;

  const bars = subsections.map((s, index) => {
    const clamped = Math.min(100, Math.max(0, s.percentage));
    return {
      label: s.subsection,
      percentage: s.percentage,
      x: plot.left,
      y: plot.top + index * rowHeight + (rowHeight - barHeight) / 2,
      width: (plot.width * clamped) / 100,
      height: barHeight
    };
  });

  const ticks = [0, 20, 40, 60, 80, 100].map((value) => ({ value, x: plot.left + (plot.width * value) / 100 }));

  return { title, width: size.width, height: size.height, plot, bars, ticks };
};

/** The subset of the 2D canvas API the painter uses. */
export type ChartContext = Pick<
  CanvasRenderingContext2D,
  'fillStyle' | 'strokeStyle' | 'font' | 'textAlign' | 'textBaseline' | 'lineWidth'
  | 'fillRect' | 'fillText' | 'beginPath' | 'moveTo' | 'lineTo' | 'stroke'
>;

export const paintBarChart = (ctx: ChartContext, model: BarChartModel): void => {
  const { plot } = model;

  ctx.fillStyle = '#ffffff';
  ctx.fillRect(0, 0, model.width, model.height);

  ctx.fillStyle = '#231f20';
  ctx.font = 'bold 28px sans-serif';
  ctx.textAlign = 'center';
  ctx.textBaseline = 'middle';
  ctx.fillText(model.title, model.width / 2, TITLE_HEIGHT / 2);

  // Vertical grid lines and tick labels
  ctx.strokeStyle = '#e0e0e0';
  ctx.lineWidth = 1;
  ctx.font = `${LABEL_FONT_SIZE}px sans-serif`;
  for (const tick of model.ticks) {
    ctx.beginPath();
    ctx.moveTo(tick.x, plot.top);
    ctx.lineTo(tick.x, plot.top + plot.height);
    ctx.stroke();
    ctx.fillText(String(tick.value), tick.x, plot.top + plot.height + 16);
  }
  ctx.fillText('Percentage', plot.left + plot.width / 2, plot.top + plot.height + 42);

  ctx.textAlign = 'right';
  for (const bar of model.bars) {
    ctx.fillStyle = CHART_COLOR;
    ctx.fillRect(bar.x, bar.y, bar.width, bar.height);
    ctx.fillStyle = '#231f20';
    ctx.fillText(bar.label, plot.left - LABEL_GAP, bar.y + bar.height / 2);
  }
};

export interface ChartCanvas {
  getContext(contextId: '2d'): ChartContext | null;
  toDataURL(type: string): string;
}

export type CanvasFactory = (width: number, height: number) => ChartCanvas;

const browserCanvas: CanvasFactory = (width, height) => {
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  return canvas;
};

export const dataUrlToBytes = (dataUrl: string): Uint8Array => {
  const base64 = dataUrl.slice(dataUrl.indexOf(',') + 1);
  const binary = atob(base64);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) bytes[i] = binary.charCodeAt(i);
  return bytes;
};

/**
 * Paints the chart on an offscreen canvas and returns it as PNG.
 * Returns undefined when the environment offers no 2D canvas context.
 */
export const renderChartImage = (
  model: BarChartModel,
  createCanvas: CanvasFactory = browserCanvas
): ImageSource | undefined => {
  const canvas = createCanvas(model.width, model.height);
  const ctx = canvas.getContext('2d');
  if (!ctx) return undefined;
  paintBarChart(ctx, model);
  return { bytes: dataUrlToBytes(canvas.toDataURL('image/png')), aspectRatio: model.width / model.height };
};
