import fs from 'fs/promises';
import { ConfigError, errorMessage } from '../errors';
import { logger } from '../logger';

const REGEX_PREFIX = 'REGEX|';

export interface IgnoreRules {
  names: string[];
  patterns: string[];
}

/**
 * Parses an ignore file: one unit name per line, `#` starts a comment line,
 * `REGEX|<pattern>` adds a pattern matched from the start of the unit name.
 */
export function parseIgnoreFile(content: string): IgnoreRules {
  const rules: IgnoreRules = { names: [], patterns: [] };
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith(REGEX_PREFIX)) {
      const pattern = line.slice(REGEX_PREFIX.length);
      if (pattern) rules.patterns.push(pattern);
    } else {
      rules.names.push(line);
    }
  }
  return rules;
}

export class IgnoreList {
  private readonly names: ReadonlySet<string>;
  private readonly regex: RegExp | null;

  constructor(rules: IgnoreRules) {
    this.names = new Set(rules.names);
    if (rules.patterns.length === 0) {
      this.regex = null;
    } else {
      const source = `^(?:${rules.patterns.join('|')})`;
      try {
        this.regex = new RegExp(source);
      } catch (error) {
        throw new ConfigError(`Invalid ignore pattern ${source}: ${errorMessage(error)}`, { cause: error });
      }
    }
  }

  static empty(): IgnoreList {
    return new IgnoreList({ names: [], patterns: [] });
  }

  isIgnored(unit: string): boolean {
    return this.names.has(unit) || (this.regex !== null && this.regex.test(unit));
  }
}

/**
 * Combines the names from config with the ignore file. A missing file is not
 * an error; an unreadable file or a bad pattern is.
 */
export async function loadIgnoreList(configured: readonly string[], file: string): Promise<IgnoreList> {
  const fromFile = await readIgnoreFile(file);
  const list = new IgnoreList({
    names: [...configured, ...fromFile.names],
    patterns: fromFile.patterns,
  });
  logger.info(
    'Watcher',
    `Ignoring ${configured.length + fromFile.names.length} unit names and ${fromFile.patterns.length} patterns`,
  );
  return list;
}

async function readIgnoreFile(file: string): Promise<IgnoreRules> {
  try {
    return parseIgnoreFile(await fs.readFile(file, 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug('Watcher', `No ignore file at ${file}`);
      return { names: [], patterns: [] };
    }
    throw new ConfigError(`Cannot read ignore file ${file}: ${errorMessage(error)}`, { cause: error });
  }
}
