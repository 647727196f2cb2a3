/**
 * Parallel Task Group
 * Spawns independent units of work, runs them under a concurrency cap,
 * and joins all of them. Settled entries come back in completion order,
 * which is what "first success" aggregation is defined against.
 */

import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';

export interface GroupUnit<T> {
  id: string;
  run: () => Promise<T>;
}

export type SettledUnit<T> =
  | { id: string; index: number; order: number; status: 'fulfilled'; value: T }
  | { id: string; index: number; order: number; status: 'rejected'; error: Error };

export interface TaskGroupOptions {
  name?: string;
  /** Upper bound on units running at once. Defaults to all units. */
  maxConcurrency?: number;
}

export interface TaskGroupStats {
  runs: number;
  completedUnits: number;
  failedUnits: number;
}

interface QueueItem<T> {
  unit: GroupUnit<T>;
  index: number;
}

export class TaskGroup {
  private readonly name: string;
  private readonly maxConcurrency: number | undefined;
  private runs = 0;
  private completedUnits = 0;
  private failedUnits = 0;

  constructor(options: TaskGroupOptions = {}) {
    if (options.maxConcurrency !== undefined && (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1)) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${options.maxConcurrency}`);
    }
    this.name = options.name ?? 'task-group';
    this.maxConcurrency = options.maxConcurrency;
  }

  /**
   * Run every unit and resolve once all have settled.
   * Never rejects: a unit that throws is reported as a rejected entry.
   */
  async run<T>(units: GroupUnit<T>[]): Promise<SettledUnit<T>[]> {
    this.runs++;
    if (units.length === 0) return [];

    const limit = Math.min(this.maxConcurrency ?? units.length, units.length);
    const pending: QueueItem<T>[] = units.map((unit, index) => ({ unit, index }));
    const settled: SettledUnit<T>[] = [];

    getLogger().debug({ group: this.name, units: units.length, concurrency: limit }, 'Task group dispatch');

    const drain = async (): Promise<void> => {
      let item = pending.shift();
      while (item) {
        const { unit, index } = item;
        try {
          const value = await unit.run();
          settled.push({ id: unit.id, index, order: settled.length, status: 'fulfilled', value });
          this.completedUnits++;
        } catch (err) {
          const error = toError(err);
          settled.push({ id: unit.id, index, order: settled.length, status: 'rejected', error });
          this.failedUnits++;
          getLogger().debug({ group: this.name, unit: unit.id, error: error.message }, 'Task group unit rejected');
        }
        item = pending.shift();
      }
    };

    const lanes: Promise<void>[] = [];
    for (let i = 0; i < limit; i++) {
      lanes.push(drain());
    }
    await Promise.all(lanes);

    return settled;
  }

  getStats(): TaskGroupStats {
    return {
      runs: this.runs,
      completedUnits: this.completedUnits,
      failedUnits: this.failedUnits,
    };
  }

  resetStats(): void {
    this.runs = 0;
    this.completedUnits = 0;
    this.failedUnits = 0;
  }
}
