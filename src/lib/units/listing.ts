import type { UnitBus } from '../interfaces';
import { logger } from '../logger';
import { matchesCheapFilters, select, type FilterSpec, type SortKey } from './filter';
import { normalize } from './normalize';
import type { Unit } from './types';

export interface UnitListing {
  /** Units passing every filter, in output order. */
  units: Unit[];
  /** Every unit the manager reported, without file properties. */
  all: Unit[];
}

/**
 * One enumeration, then file properties only for the units that survive the
 * filters that don't need them.
 */
export async function queryUnits(bus: UnitBus, filters: FilterSpec, sortKey: SortKey): Promise<UnitListing> {
  const records = await bus.listUnits();
  const all = records.map(normalize);

  const candidates = records.filter((_, index) => matchesCheapFilters(all[index], filters));
  logger.debug('Listing', `${candidates.length} of ${records.length} units need file properties`);

  const enriched = await bus.readUnitFileProperties(candidates);
  return { units: select(enriched.map(normalize), filters, sortKey), all };
}
