export { parseDecimal, parseCellNumber, formatNumber } from './number-utils';

export {
  createTabularData,
  tabularDataFromRecord,
  tabularDataFromColumns,
  tabularDataToRecord,
  getRowCount,
  getColumnNames,
  getCell,
  type TabularColumn,
} from './tabular-utils';

export {
  createSection,
  effectiveBorderWidth,
  describeSection,
  type SectionOptions,
} from './section-utils';
