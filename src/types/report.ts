export interface ImageSource {
  bytes: Uint8Array; // PNG data
  aspectRatio: number; // width / height
}

export type TextEmphasis = 'regular' | 'bold' | 'heading';

export type ReportBlock =
  | { kind: 'header'; logo?: ImageSource; title: string }
  | { kind: 'text'; content: string; emphasis: TextEmphasis }
  | { kind: 'scoreLine'; label: string; raw: number; max: number }
  | { kind: 'image'; image: ImageSource };

export type FontWeight = 'regular' | 'bold';

export interface TextMeasurer {
  widthOf: (text: string, size: number, weight: FontWeight) => number;
}

// Positions use a top-left origin; the PDF renderer flips them.
export type PlacedItem =
  | { kind: 'text'; text: string; x: number; y: number; size: number; weight: FontWeight }
  | { kind: 'image'; image: ImageSource; x: number; y: number; width: number; height: number };

export interface LaidOutPage {
  items: PlacedItem[];
}

export interface ReportLayout {
  pages: LaidOutPage[];
  droppedImages: number;
}
