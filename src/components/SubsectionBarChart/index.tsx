import React, { useMemo } from 'react';
import { buildBarChartModel, CHART_COLOR, LABEL_GAP } from '../../utils/charts';
import type { SubsectionTotals } from '../../utils/scoring';

interface SubsectionBarChartProps {
  category: string;
  subsections: readonly SubsectionTotals[];
}

const SubsectionBarChart: React.FC<SubsectionBarChartProps> = ({ category, subsections }) => {
  const model = useMemo(() => buildBarChartModel(category, subsections), [category, subsections]);
  const { plot } = model;

  return (
    <svg
      className='subsection-chart'
      viewBox={`0 0 ${model.width} ${model.height}`}
      role='img'
      aria-label={category}
    >
      <text x={model.width / 2} y={28} textAnchor='middle' className='chart-title'>{model.title}</text>
      {model.ticks.map((tick) => (
        <g key={tick.value}>
          <line x1={tick.x} x2={tick.x} y1={plot.top} y2={plot.top + plot.height} stroke='#e0e0e0' />
          <text x={tick.x} y={plot.top + plot.height + 22} textAnchor='middle' className='chart-tick'>
            {tick.value}
          </text>
        </g>
      ))}
      <text x={plot.left + plot.width / 2} y={plot.top + plot.height + 48} textAnchor='middle' className='chart-tick'>
        Percentage
      </text>
      {model.bars.map((bar) => (
        <g key={bar.label} data-testid='chart-bar'>
          <text x={plot.left - LABEL_GAP} y={bar.y + bar.height / 2} textAnchor='end' dominantBaseline='middle'>
            {bar.label}
          </text>
          <rect x={bar.x} y={bar.y} width={bar.width} height={bar.height} fill={CHART_COLOR}>
            <title>{`${bar.label}: ${bar.percentage}%`}</title>
          </rect>
        </g>
      ))}
    </svg>
  );
};

export default SubsectionBarChart;
