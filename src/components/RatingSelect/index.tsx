import React from 'react';

interface RatingOption {
  value: number;
  label: string;
}

interface RatingSelectProps {
  id: string;
  label: string;
  value: number | undefined;
  options: RatingOption[];
  placeholder: string;
  onChange: (value: string) => void;
}

const RatingSelect: React.FC<RatingSelectProps> = ({ id, label, value, options, placeholder, onChange }) => (
  <div className='question-item'>
    <label htmlFor={id} className='question-text'>{label}</label>
    <select
      id={id}
      className='rating-select'
      value={value === undefined ? '' : String(value)}
      onChange={(e) => onChange(e.target.value)}
    >
      <option value='' disabled>{placeholder}</option>
      {options.map((o) => (
        <option key={o.value} value={String(o.value)}>
          {o.value} = {o.label}
        </option>
      ))}
    </select>
  </div>
);

export default RatingSelect;
