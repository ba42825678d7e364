import type { PickOptions, RefreshOptions } from './picker.types';
import { weightedOrder } from './weighted_sampling';
import type { RuntimeState } from '../runtime_state/runtime_state';
import { isChoosable, type Task } from '../eligibility';

/**
 * Walks the draw order and takes each task whose cost still fits.
 */
function fillSpoonBudget(order: Task[], budget: number): Task[] {
  const chosen: Task[] = [];
  let remaining = budget;
  for (const task of order) {
    if (remaining <= 0) {
      break;
    }
    if (task.config.spoons <= remaining) {
      chosen.push(task);
      remaining -= task.config.spoons;
    }
  }
  return chosen;
}

/**
 * Tops up today's set.
 *
 * On the first call of a new effective day the previous day's set is
 * dropped. Then as many tasks as the selection policy still needs are drawn
 * from the choosable ones, weighted by `weight`, and committed to state.
 * Fewer eligible tasks than needed is not an error: the set is filled as far
 * as possible.
 *
 * @returns whether any task was added, i.e. whether the state needs saving
 */
export function pickTodaysTasks(runtime: RuntimeState, options: PickOptions = {}): boolean {
  const random = options.random ?? Math.random;
  const exclude = new Set(options.exclude ?? []);

  if (runtime.todaysDate() > runtime.lastGeneratedDate()) {
    runtime.clearTodaysTasks();
  }

  const selection = runtime.selection;
  const needed = selection.mode === 'count'
    ? selection.dailyTasks - runtime.todaysTasks().length
    : selection.dailySpoons - runtime.todaysSpoons();
  if (needed <= 0) {
    return false;
  }

  const candidates = runtime.tasks().filter(task => !exclude.has(task.slug) && isChoosable(task, runtime));
  const order = weightedOrder(candidates, task => task.config.weight, random);
  const chosen = selection.mode === 'count' ? order.slice(0, needed) : fillSpoonBudget(order, needed);

  for (const task of chosen) {
    runtime.chooseTask(task.slug);
  }
  runtime.markGenerated();

  return chosen.length > 0;
}

/**
 * Drops tasks from today's set and draws replacements, never redrawing a
 * dropped task in the same call.
 *
 * @throws TaskNotFoundError for a slug that is not in the catalog
 */
export function refreshTodaysTasks(runtime: RuntimeState, options: RefreshOptions = {}): boolean {
  const slugs = options.slugs === undefined
    ? runtime.uncompletedTasks().map(task => task.slug)
    : [...options.slugs];
  const dropped = runtime.resetTodaysTasks(slugs);

  const exclude = new Set([...dropped, ...(options.exclude ?? [])]);
  const pickOptions: PickOptions = { exclude };
  if (options.random) {
    pickOptions.random = options.random;
  }
  return pickTodaysTasks(runtime, pickOptions);
}
