import { Command, Option } from 'commander';
import { createUnitBus, withUnitBus } from '../lib/bus/client';
import { getConfig, type AppConfig } from '../lib/config';
import type { UnitBus } from '../lib/interfaces';
import { logger } from '../lib/logger';
import {
  FILTER_VALUES,
  SORT_FLAG_VALUES,
  parseFilterList,
  parseTypeFilter,
  type FilterFlag,
  type FilterSpec,
  type SortKey,
} from '../lib/units/filter';
import { queryUnits } from '../lib/units/listing';
import { nameWidthFor, renderSummary, renderTable, type TableOptions } from '../lib/units/table';
import { VERSION } from '../lib/version';
import { EXIT_OK, processIO, reportError, type CliIO } from './io';

interface ListOptions {
  user?: boolean;
  descFile?: boolean;
  sortBy?: string;
  type?: string;
  loaded?: string;
  active?: string;
  subActive?: string;
  fileState?: string;
  filePreset?: string;
}

export interface ListDeps extends CliIO {
  openBus?: (config: AppConfig) => UnitBus;
  loadConfig?: () => Promise<AppConfig>;
}

const valuesText = (flag: FilterFlag) => FILTER_VALUES[flag]?.join(', ') ?? 'any sub-state';

function buildProgram(io: CliIO): Command {
  return new Command('unitscope')
    .description('List systemd units with their load, active and unit file states.\nAll filters take comma-separated lists.')
    .version(VERSION, '-V, --version')
    .option('--user', 'query the user service manager instead of the system one')
    .option('--desc-file', 'show the Description and File columns')
    .addOption(new Option('--sort-by <key>', 'sort by a column').choices(Object.keys(SORT_FLAG_VALUES)))
    .option('--type <types>', `unit types: ${valuesText('type')}`)
    .option('--loaded <states>', `load states: ${valuesText('loaded')}`)
    .option('--active <states>', `active states: ${valuesText('active')}`)
    .option('--sub-active <states>', `sub-states: ${valuesText('sub-active')}`)
    .option('--file-state <states>', `unit file states: ${valuesText('file-state')}`)
    .option('--file-preset <presets>', `unit file presets: ${valuesText('file-preset')}`)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout.write(text),
      writeErr: text => io.stderr.write(text),
    })
    .showHelpAfterError('(run with --help for usage)');
}

export function toFilterSpec(options: ListOptions): FilterSpec {
  const list = (flag: FilterFlag, value: string | undefined) =>
    value === undefined ? undefined : parseFilterList(flag, value);

  return {
    type: options.type === undefined ? undefined : parseTypeFilter(options.type),
    loadState: list('loaded', options.loaded),
    activeState: list('active', options.active),
    subState: list('sub-active', options.subActive),
    unitFileState: list('file-state', options.fileState),
    unitFilePreset: list('file-preset', options.filePreset),
  };
}

export const toSortKey = (value: string | undefined): SortKey =>
  value === undefined ? 'none' : SORT_FLAG_VALUES[value] ?? 'none';

/** Runs `unitscope` with the arguments after the program name and returns the exit code. */
export async function runList(argv: readonly string[], deps: ListDeps = processIO()): Promise<number> {
  const { openBus = createUnitBus, loadConfig = getConfig } = deps;

  try {
    const program = buildProgram(deps);
    program.parse([...argv], { from: 'user' });
    const options = program.opts<ListOptions>();

    const filters = toFilterSpec(options);
    const sortKey = toSortKey(options.sortBy);

    const loaded = await loadConfig();
    if (loaded.logLevel && !process.env.LOG_LEVEL) logger.setLogLevel(loaded.logLevel);
    const config: AppConfig = { ...loaded, scope: options.user ? 'user' : 'system' };

    const { units, all } = await withUnitBus(
      () => openBus(config),
      bus => queryUnits(bus, filters, sortKey),
    );

    const tableOptions: TableOptions = { showDescFile: options.descFile === true };
    if (deps.isTTY && deps.columns) {
      tableOptions.maxNameWidth = nameWidthFor(units, deps.columns, tableOptions);
    }

    const summary = renderSummary(units, all, deps.isTTY === true);
    if (summary.length > 0) deps.stderr.write(`${summary.join('\n')}\n\n`);
    deps.stdout.write(`${renderTable(units, tableOptions).join('\n')}\n`);
    return EXIT_OK;
  } catch (error) {
    return reportError(error, deps);
  }
}
