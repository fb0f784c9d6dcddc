import React from 'react';

interface ProgressBarProps {
  percent: number;
  label?: React.ReactNode;
  color?: string;
}

const ProgressBar: React.FC<ProgressBarProps> = ({ percent, label, color = '#377bff' }) => {
  const width = Math.min(100, Math.max(0, percent));
  return (
    <div
      className='progress-bar-container'
      role='progressbar'
      aria-valuemin={0}
      aria-valuemax={100}
      aria-valuenow={width}
    >
      <div
        className='progress-bar'
        style={{ '--progress-width': `${width}%`, '--progress-color': color } as React.CSSProperties}
      >
        {label ?? `${width}%`}
      </div>
    </div>
  );
};

export default ProgressBar;
