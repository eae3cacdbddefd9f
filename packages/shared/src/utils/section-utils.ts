import type { Section, SectionStyle, TabularData } from '../types/report-types';
import { DEFAULT_SECTION_STYLE, REPORT_TEXT } from '../constants/report-constants';

/** Everything on a section except its data, all optional */
export type SectionOptions = Partial<Omit<Section, 'data' | 'style'>> & {
  style?: Partial<SectionStyle>;
};

/** Build a section, filling omitted options with their defaults */
export function createSection(data: TabularData, options: SectionOptions = {}): Section {
  return {
    title: options.title,
    data,
    summaryItems: options.summaryItems ?? [],
    showRowNumbers: options.showRowNumbers ?? false,
    style: { ...DEFAULT_SECTION_STYLE, ...options.style },
    showHeader: options.showHeader ?? true,
    calculatedColumns: options.calculatedColumns ?? [],
  };
}

/** Border width as consumers use it: never negative */
export function effectiveBorderWidth(style: SectionStyle): number {
  return Math.max(0, Math.trunc(style.borderWidth));
}

/** Title used in diagnostics when a section has none */
export function describeSection(section: Pick<Section, 'title'>): string {
  const title = section.title?.trim();
  return title ? title : REPORT_TEXT.UNTITLED_SECTION;
}
