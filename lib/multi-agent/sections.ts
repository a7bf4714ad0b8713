import { ANALYSIS_CONFIG } from '../config';

export interface SectionExtractionOptions {
  marker?: string;
  minLineLength?: number;
  maxItems?: number;
}

/**
 * Pulls the bullet-ish lines that follow `heading` in a markdown narrative, up
 * to the next level-2 heading marker. Lines must be longer than
 * `minLineLength` before trimming. Returns `fallback` when the heading is
 * missing or nothing in the section qualifies.
 */
export function extractSection(
  narrative: string,
  heading: string,
  fallback: readonly string[],
  options: SectionExtractionOptions = {}
): string[] {
  const {
    marker = ANALYSIS_CONFIG.SECTION_MARKER,
    minLineLength = ANALYSIS_CONFIG.MIN_LINE_LENGTH,
    maxItems = ANALYSIS_CONFIG.MAX_SECTION_ITEMS,
  } = options;

  const headingIndex = narrative.indexOf(heading);
  if (headingIndex === -1) {
    return [...fallback];
  }

  const afterHeading = narrative.slice(headingIndex + heading.length);
  const markerIndex = afterHeading.indexOf(marker);
  const section = markerIndex === -1 ? afterHeading : afterHeading.slice(0, markerIndex);

  const lines = section
    .split('\n')
    .filter(line => line.trim().length > 0 && line.length > minLineLength)
    .map(line => line.trim())
    .slice(0, maxItems);

  return lines.length > 0 ? lines : [...fallback];
}

export function extractMarketGaps(narrative: string): string[] {
  return extractSection(narrative, ANALYSIS_CONFIG.MARKET_GAPS_HEADING, ANALYSIS_CONFIG.DEFAULT_MARKET_GAPS);
}

export function extractCompetitorWeaknesses(narrative: string): string[] {
  return extractSection(narrative, ANALYSIS_CONFIG.WEAKNESSES_HEADING, ANALYSIS_CONFIG.DEFAULT_WEAKNESSES);
}
