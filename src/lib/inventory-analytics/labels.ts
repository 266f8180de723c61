/**
 * Display labels used at the presentation boundary (Vietnamese, as shown on
 * the dashboard). The engine itself works with the keys only.
 */

import type { DisplayMode, Segment } from './types';

export const SEGMENT_LABELS: Record<Segment, string> = {
  low: 'Thấp',
  medium: 'Trung bình',
  high: 'Cao',
  undefined: 'Không xác định',
};

export const DISPLAY_MODE_LABELS: Record<DisplayMode, string> = {
  sales: 'Bán hàng',
  inventory: 'Tồn kho',
};

export function segmentLabel(segment: Segment): string {
  return SEGMENT_LABELS[segment];
}

/**
 * Accepts a segment key or its label
 */
export function parseSegment(value: string): Segment | null {
  for (const [segment, label] of Object.entries(SEGMENT_LABELS)) {
    if (value === segment || value === label) {
      return isSegment(segment) ? segment : null;
    }
  }
  return null;
}

/**
 * Accepts a display mode key or its label
 */
export function parseDisplayMode(value: string): DisplayMode | null {
  if (value === 'sales' || value === DISPLAY_MODE_LABELS.sales) return 'sales';
  if (value === 'inventory' || value === DISPLAY_MODE_LABELS.inventory) return 'inventory';
  return null;
}

function isSegment(value: string): value is Segment {
  return value in SEGMENT_LABELS;
}
