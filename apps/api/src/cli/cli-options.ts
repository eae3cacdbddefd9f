import type { CalculatedColumn, ColumnCalcType, SectionStyle, SummaryItem } from '@tabula/shared';
import { COLUMN_CALC_TYPES } from '@tabula/shared';

export interface CliOptions {
  format: string;
  dataPath: string;
  title: string;
  showHeader: boolean;
  showRowNumbers: boolean;
  includeSummary: boolean;
  includeCalculated: boolean;
  style: SectionStyle;
  csvHasHeader: boolean;
  /** Falls back to CSV_DELIMITER when absent */
  delimiter?: string;
  /** Falls back to REPORT_OUTPUT_DIR when absent */
  outputDir?: string;
  summaryItems: SummaryItem[];
  calculatedColumns: CalculatedColumn[];
}

export interface ParsedCliArgs {
  options: CliOptions;
  /** Ignored or malformed arguments, one message each */
  warnings: string[];
}

type Toggle = 'showHeader' | 'showRowNumbers' | 'includeSummary' | 'includeCalculated' | 'csvHasHeader';
type StyleToggle = 'titleBold' | 'titleItalic' | 'underline' | 'headerBold';

const TOGGLES: Readonly<Record<string, readonly [Toggle, boolean]>> = {
  '--with-header': ['showHeader', true],
  '--no-header': ['showHeader', false],
  '--with-rownums': ['showRowNumbers', true],
  '--no-rownums': ['showRowNumbers', false],
  '--with-summary': ['includeSummary', true],
  '--no-summary': ['includeSummary', false],
  '--calc': ['includeCalculated', true],
  '--with-calculated': ['includeCalculated', true],
  '--no-calc': ['includeCalculated', false],
  '--no-csv-header': ['csvHasHeader', false],
};

const STYLE_TOGGLES: Readonly<Record<string, readonly [StyleToggle, boolean]>> = {
  '--bold': ['titleBold', true],
  '--no-bold': ['titleBold', false],
  '--italic': ['titleItalic', true],
  '--no-italic': ['titleItalic', false],
  '--underline': ['underline', true],
  '--no-underline': ['underline', false],
  '--header-bold': ['headerBold', true],
};

const SUMMARY_FLAGS = {
  '--sum': 'SUM',
  '--avg': 'AVG',
  '--min': 'MIN',
  '--max': 'MAX',
  '--count': 'COUNT',
} as const;

function isSummaryFlag(name: string): name is keyof typeof SUMMARY_FLAGS {
  return name in SUMMARY_FLAGS;
}

function isColumnCalcType(value: string): value is ColumnCalcType {
  return COLUMN_CALC_TYPES.some((type) => type === value);
}

/** Integer value of `--border=N`; anything else is 0 */
function parseBorder(value: string): number {
  return /^[+-]?\d+$/.test(value.trim()) ? parseInt(value, 10) : 0;
}

export function defaultCliOptions(): CliOptions {
  return {
    format: 'txt',
    dataPath: 'data.csv',
    title: 'Report',
    showHeader: true,
    showRowNumbers: true,
    includeSummary: true,
    includeCalculated: true,
    style: { titleBold: true, titleItalic: true, underline: false, headerBold: false, borderWidth: 0 },
    csvHasHeader: true,
    summaryItems: [],
    calculatedColumns: [],
  };
}

/**
 * `[format] [data-path] [--flag | --name=value ...]`. Never throws: anything
 * it cannot use is reported in `warnings` and skipped.
 */
export function parseCliArgs(args: readonly string[]): ParsedCliArgs {
  const options = defaultCliOptions();
  const warnings: string[] = [];
  let positional = 0;

  for (const arg of args) {
    if (!arg.startsWith('--')) {
      if (positional === 0) options.format = arg;
      else if (positional === 1) options.dataPath = arg;
      else warnings.push(`Unexpected argument '${arg}'`);
      positional++;
      continue;
    }

    const toggle = TOGGLES[arg];
    if (toggle) {
      options[toggle[0]] = toggle[1];
      continue;
    }
    const styleToggle = STYLE_TOGGLES[arg];
    if (styleToggle) {
      options.style[styleToggle[0]] = styleToggle[1];
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq < 0) {
      warnings.push(`Unknown option '${arg}'`);
      continue;
    }
    const name = arg.slice(0, eq);
    const value = arg.slice(eq + 1);

    if (isSummaryFlag(name)) {
      const column = value.trim();
      if (!column) {
        warnings.push(`Missing column in '${arg}', expected ${name}=Column`);
        continue;
      }
      const calcType = SUMMARY_FLAGS[name];
      options.summaryItems.push({ label: `${calcType} ${column}`, calcType, columnName: column });
      continue;
    }

    switch (name) {
      case '--border':
        options.style.borderWidth = parseBorder(value);
        break;
      case '--title':
        options.title = value;
        break;
      case '--delimiter':
        if (value.length === 1) options.delimiter = value;
        else warnings.push(`Ignoring '${arg}', the delimiter must be one character`);
        break;
      case '--out-dir':
        if (value) options.outputDir = value;
        else warnings.push(`Ignoring '${arg}', no directory given`);
        break;
      case '--countif': {
        const sep = value.indexOf(':');
        const column = sep < 0 ? '' : value.slice(0, sep).trim();
        if (!column) {
          warnings.push(`Malformed '${arg}', expected --countif=Column:Value`);
          break;
        }
        const condition = value.slice(sep + 1);
        options.summaryItems.push({
          label: `COUNT_IF ${column} == ${condition}`,
          calcType: 'COUNT_IF',
          columnName: column,
          conditionValue: condition,
        });
        break;
      }
      case '--calc-column': {
        const calculated = parseCalculatedColumn(value);
        if (calculated) options.calculatedColumns.push(calculated);
        else warnings.push(`Malformed '${arg}', expected --calc-column=Name:OPERATION:ColA,ColB`);
        break;
      }
      default:
        warnings.push(`Unknown option '${arg}'`);
    }
  }

  return { options, warnings };
}

/** `Name:OPERATION:ColA,ColB` */
function parseCalculatedColumn(spec: string): CalculatedColumn | null {
  const parts = spec.split(':');
  if (parts.length !== 3) return null;
  const [rawName = '', rawOperation = '', rawSources = ''] = parts;

  const name = rawName.trim();
  const operation = rawOperation.trim().toUpperCase();
  const sourceColumns = rawSources
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

  if (!name || !isColumnCalcType(operation) || sourceColumns.length === 0) return null;
  return { name, operation, sourceColumns };
}
