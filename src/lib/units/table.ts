import { fieldText, type EnumField, type Unit } from './types';

const COLUMN_GAP = '   ';
const ELLIPSIS = '...';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

export interface TableOptions {
  /** Adds the Description and File columns. */
  showDescFile?: boolean;
  /** Truncates names longer than this; unset means no limit. */
  maxNameWidth?: number;
}

export const truncate = (text: string, width: number): string =>
  text.length > width ? text.slice(0, Math.max(0, width - ELLIPSIS.length)) + ELLIPSIS : text;

// systemd escapes '-' inside instance names as \x2d
export const displayName = (name: string): string => name.replace(/\\x2d/g, '-');

const fileStateText = (field: EnumField<string> | null): string =>
  fieldText(field).replace(/-runtime$/, '-rt');

function rowCells(unit: Unit, options: TableOptions): string[] {
  const name = displayName(unit.name);
  const cells = [
    options.maxNameWidth !== undefined ? truncate(name, options.maxNameWidth) : name,
    fieldText(unit.loadState),
    fieldText(unit.activeState),
    unit.subState.raw,
    fileStateText(unit.unitFileState),
    fieldText(unit.unitFilePreset),
  ];
  if (options.showDescFile) {
    cells.push(unit.description, unit.filePath);
  }
  return cells;
}

export function tableHeaders(options: TableOptions = {}): string[] {
  const headers = ['Name', 'Loaded', 'Active', 'SubActive', 'FileState', 'FilePreset'];
  if (options.showDescFile) headers.push('Description', 'File');
  return headers;
}

/**
 * Lays the units out as aligned columns. Widths come from this result set only,
 * so a narrow selection gives a narrow table.
 */
export function renderTable(units: readonly Unit[], options: TableOptions = {}): string[] {
  const headers = tableHeaders(options);
  const rows = units.map(unit => rowCells(unit, options));
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => row[column]?.length ?? 0)),
  );

  const line = (cells: string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join(COLUMN_GAP)
      .trimEnd();

  const totalWidth = widths.reduce((sum, width) => sum + width, 0) + COLUMN_GAP.length * (widths.length - 1);

  return [line(headers), '-'.repeat(totalWidth), ...rows.map(line)];
}

/** Width left for the Name column when the whole table has to fit in `columns`. */
export function nameWidthFor(units: readonly Unit[], columns: number, options: TableOptions = {}): number {
  const headers = tableHeaders(options);
  const rows = units.map(unit => rowCells(unit, { ...options, maxNameWidth: undefined }));
  let others = 0;
  for (let column = 1; column < headers.length; column += 1) {
    others += Math.max(headers[column]?.length ?? 0, ...rows.map(row => row[column]?.length ?? 0));
    others += COLUMN_GAP.length;
  }
  return Math.max(headers[0]?.length ?? 0, columns - others);
}

type CountedField = 'loadState' | 'activeState' | 'subState' | 'unitFileState' | 'unitFilePreset';

const SUMMARY_FIELDS: { label: string; field: CountedField }[] = [
  { label: 'Loaded', field: 'loadState' },
  { label: 'Active', field: 'activeState' },
  { label: 'SubActive', field: 'subState' },
  { label: 'FileState', field: 'unitFileState' },
  { label: 'FilePreset', field: 'unitFilePreset' },
];

/**
 * Per-type counts: `SERVICES: 3 / 40` followed by how many of those units sit in
 * each state. The total is left out when no unit of that type was filtered away.
 */
export function renderSummary(selected: readonly Unit[], all: readonly Unit[], bold = false): string[] {
  const byType = new Map<string, Unit[]>();
  for (const unit of selected) {
    const type = fieldText(unit.type) || 'unknown';
    const group = byType.get(type) ?? [];
    group.push(unit);
    byType.set(type, group);
  }

  const lines: string[] = [];
  for (const type of [...byType.keys()].sort()) {
    const group = byType.get(type) ?? [];
    const total = all.filter(unit => (fieldText(unit.type) || 'unknown') === type).length;
    const heading = `${type.toUpperCase()}S:`;
    let line = `${bold ? `${BOLD}${heading}${RESET}` : heading} ${group.length}`;
    if (total !== group.length) line += ` / ${total}`;
    lines.push(line);

    for (const { label, field } of SUMMARY_FIELDS) {
      const counts = new Map<string, number>();
      for (const unit of group) {
        const value = fieldText(unit[field]);
        if (value) counts.set(value, (counts.get(value) ?? 0) + 1);
      }
      if (counts.size === 0) continue;
      const parts = [...counts].map(([value, count]) => `${value}: ${count}`);
      lines.push(`${label}: ${parts.join(', ')}`);
    }
  }
  return lines;
}
