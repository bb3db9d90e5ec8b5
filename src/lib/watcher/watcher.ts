import { withTimeout } from '../async';
import { errorMessage } from '../errors';
import type { UnitBus, UnitChangeEvent, UnitChangeSubscription } from '../interfaces';
import { logger } from '../logger';
import type { Notifier, Urgency } from '../notify/types';
import { unitTypeOf } from '../units/normalize';
import { fieldText } from '../units/types';
import { IgnoreList } from './ignore';
import { DEFAULT_FAILURE_RULES, deriveHealth, describeChange, transition, type FailureRuleTable, type HealthState } from './state';

export interface WatchEntry {
  activeState: string;
  subState: string;
  health: HealthState;
}

export interface FailureWatcherOptions {
  rules?: FailureRuleTable;
  ignore?: IgnoreList;
  notifyTimeoutMs: number;
  urgency?: Urgency;
}

export class FailureWatcher {
  private readonly entries = new Map<string, WatchEntry>();
  private readonly rules: FailureRuleTable;
  private ignore: IgnoreList;

  constructor(
    private readonly bus: UnitBus,
    private readonly notifier: Notifier,
    private readonly options: FailureWatcherOptions,
  ) {
    this.rules = options.rules ?? DEFAULT_FAILURE_RULES;
    this.ignore = options.ignore ?? IgnoreList.empty();
  }

  setIgnoreList(ignore: IgnoreList) {
    this.ignore = ignore;
  }

  entry(unit: string): WatchEntry | undefined {
    return this.entries.get(unit);
  }

  /** Consumes the subscription one event at a time until it ends or fails. */
  async run(subscription: UnitChangeSubscription): Promise<void> {
    for await (const event of subscription) {
      await this.handleEvent(event);
    }
  }

  async handleEvent(event: UnitChangeEvent): Promise<void> {
    if (this.ignore.isIgnored(event.unit)) {
      logger.debug('Watcher', `Ignoring change of ${event.unit}`);
      return;
    }

    const state = await this.resolveState(event);
    if (!state) return;

    const { activeState, subState } = state;
    const next = deriveHealth(fieldText(unitTypeOf(event.unit)), activeState, subState, this.rules);
    const prev = this.entries.get(event.unit)?.health ?? 'unknown';
    const { health, notify } = transition(prev, next);

    this.entries.set(event.unit, { activeState, subState, health });

    const message = describeChange(event.unit, activeState, subState);
    logger.info('Watcher', message);

    if (notify) {
      await this.sendFailure(event.unit, message);
    }
  }

  private async resolveState(event: UnitChangeEvent): Promise<{ activeState: string; subState: string } | null> {
    const changedActive: string | undefined = event.changed.ActiveState;
    const changedSub: string | undefined = event.changed.SubState;
    const touched = (key: string) => key in event.changed || event.invalidated.includes(key);

    if (!touched('ActiveState') && !touched('SubState')) return null;
    if (changedActive !== undefined && changedSub !== undefined) {
      return { activeState: changedActive, subState: changedSub };
    }

    try {
      const read = await this.bus.readUnitState(event.objectPath);
      return {
        activeState: changedActive ?? read.activeState,
        subState: changedSub ?? read.subState,
      };
    } catch (error) {
      logger.warn('Watcher', `Cannot read state of ${event.unit}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async sendFailure(unit: string, body: string) {
    const { notifyTimeoutMs } = this.options;
    try {
      await withTimeout(
        this.notifier.notify({ title: 'Unit failed', body, urgency: this.options.urgency ?? 'critical', key: unit }),
        notifyTimeoutMs,
        () => new Error(`Notification timed out after ${notifyTimeoutMs}ms`),
      );
    } catch (error) {
      logger.error('Watcher', `Failed to send notification: ${errorMessage(error)}`);
    }
  }
}
