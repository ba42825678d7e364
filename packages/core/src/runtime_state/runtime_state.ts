import type { Orphans, RuntimeStateOptions, UpsertResult } from './runtime_state.types';
import type { ConfigStore } from '../config_store';
import type { StateStore } from '../state_store';
import {
  createDefaultConfigDocument,
  createDefaultStateDocument,
  type ConfigDocument,
  type SelectionPolicy,
  type StateDocument,
} from '../documents';
import {
  disableTaskConfig,
  enableTaskConfig,
  mergeTaskConfig,
  type DisabledPolicy,
  type TaskConfig,
  type TaskConfigPatch,
} from '../task_config';
import {
  chooseTaskState,
  completeTaskState,
  createTaskState,
  disableTaskState,
  enableTaskState,
  type TaskState,
} from '../task_state';
import { TaskSet } from '../task_set';
import { isDisabled, type EligibilityContext, type Task } from '../eligibility';
import { TaskAlreadyExistsError, TaskNotFoundError, ValidationError } from '../errors';
import { systemClock, type Clock } from '../utils/clock';
import { dateWithCutOff, daysBetween, parseTimeOfDay, type PlainDate } from '../utils/date_utils';

/**
 * The config and state documents joined by slug.
 *
 * Configs and states live in one map each, keyed by slug; today's set and
 * the orphan bookkeeping hold slugs only and resolve through those maps.
 * Mutations stay in memory until `save()`.
 *
 * The effective day is computed once, when the runtime state is created,
 * and does not move for the rest of the process even if the cut-off passes.
 */
export class RuntimeState implements EligibilityContext {
  private readonly configs = new Map<string, TaskConfig>();
  private readonly states = new Map<string, TaskState>();
  private readonly orphanedStates = new Map<string, TaskState>();
  private readonly orphanedTodaysTasks: string[] = [];
  private readonly todaysSet = new TaskSet();
  private cutOffValue: string;
  private selectionValue: SelectionPolicy;
  private lastGenerated: string;
  private readonly today: PlainDate;

  private constructor(
    private readonly configStore: ConfigStore,
    private readonly stateStore: StateStore,
    config: ConfigDocument,
    state: StateDocument,
    private readonly clock: Clock,
  ) {
    this.cutOffValue = config.cutOff;
    this.selectionValue = config.selection;
    this.lastGenerated = state.lastGenerated;
    this.today = dateWithCutOff(clock(), parseTimeOfDay(config.cutOff));

    for (const taskConfig of config.tasks) {
      this.configs.set(taskConfig.slug, taskConfig);
      this.states.set(taskConfig.slug, state.tasks[taskConfig.slug] ?? createTaskState());
    }
    for (const [slug, taskState] of Object.entries(state.tasks)) {
      if (!this.configs.has(slug)) {
        this.orphanedStates.set(slug, taskState);
      }
    }
    for (const slug of state.todaysTasks) {
      if (this.configs.has(slug)) {
        this.todaysSet.add(slug);
      } else {
        this.orphanedTodaysTasks.push(slug);
      }
    }
  }

  /**
   * Loads both documents and joins them.
   *
   * A document that does not exist yet is created with defaults and saved
   * right away. State entries without a matching task are kept aside as
   * orphans, never an error.
   *
   * @throws DocumentIoError or SerializationError from the stores
   */
  static async load(
    configStore: ConfigStore,
    stateStore: StateStore,
    options: RuntimeStateOptions = {},
  ): Promise<RuntimeState> {
    const clock = options.clock ?? systemClock;

    let config = await configStore.loadConfig();
    if (!config) {
      config = createDefaultConfigDocument();
      await configStore.saveConfig(config);
    }
    let state = await stateStore.loadState(clock());
    if (!state) {
      state = createDefaultStateDocument(clock());
      await stateStore.saveState(state);
    }

    return new RuntimeState(configStore, stateStore, config, state, clock);
  }

  /**
   * Writes the state document, then the config document.
   *
   * There is no rollback: if the second write fails the first one stays,
   * and the caller should report the failure and retry.
   */
  async save(): Promise<void> {
    await this.stateStore.saveState(this.toStateDocument());
    await this.configStore.saveConfig(this.toConfigDocument());
  }

  toConfigDocument(): ConfigDocument {
    return {
      cutOff: this.cutOffValue,
      selection: { ...this.selectionValue },
      tasks: [...this.configs.values()],
    };
  }

  toStateDocument(): StateDocument {
    const tasks: Record<string, TaskState> = {};
    for (const [slug, taskState] of this.orphanedStates) {
      tasks[slug] = taskState;
    }
    for (const [slug, taskState] of this.states) {
      tasks[slug] = taskState;
    }
    return {
      lastGenerated: this.lastGenerated,
      tasks,
      todaysTasks: this.todaysSet.values(),
    };
  }

  get configLocation(): string {
    return this.configStore.location;
  }

  get stateLocation(): string {
    return this.stateStore.location;
  }

  // ==================== Catalog ====================

  hasTask(slug: string): boolean {
    return this.configs.has(slug);
  }

  findTask(slug: string): Task | undefined {
    const config = this.configs.get(slug);
    const state = this.states.get(slug);
    if (!config || !state) {
      return undefined;
    }
    return { slug, config, state };
  }

  /**
   * @throws TaskNotFoundError
   */
  getTask(slug: string): Task {
    const task = this.findTask(slug);
    if (!task) {
      throw new TaskNotFoundError(slug);
    }
    return task;
  }

  /** Every task, in slug order */
  tasks(): Task[] {
    return this.taskSlugs().map(slug => this.getTask(slug));
  }

  taskSlugs(): string[] {
    return [...this.configs.keys()].sort();
  }

  enabledTasks(): Task[] {
    return this.tasks().filter(task => !isDisabled(task, this));
  }

  disabledTasks(): Task[] {
    return this.tasks().filter(task => isDisabled(task, this));
  }

  /**
   * Registers a new task with a fresh state.
   * @throws TaskAlreadyExistsError when the slug is taken; nothing changes
   */
  addTask(config: TaskConfig): void {
    if (this.configs.has(config.slug)) {
      throw new TaskAlreadyExistsError(config.slug);
    }
    this.orphanedStates.delete(config.slug);
    this.configs.set(config.slug, config);
    this.states.set(config.slug, createTaskState());
  }

  addTasks(configs: Iterable<TaskConfig>): void {
    for (const config of configs) {
      this.addTask(config);
    }
  }

  /**
   * Merges the patch into the existing config with the same slug.
   * @throws TaskNotFoundError
   */
  updateTask(patch: TaskConfigPatch): void {
    const existing = this.configs.get(patch.slug);
    if (!existing) {
      throw new TaskNotFoundError(patch.slug);
    }
    this.configs.set(patch.slug, mergeTaskConfig(existing, patch));
  }

  updateTasks(patches: Iterable<TaskConfigPatch>): void {
    for (const patch of patches) {
      this.updateTask(patch);
    }
  }

  /**
   * Merges into the existing task, or adds it when the slug is new.
   */
  upsertTask(config: TaskConfig): UpsertResult {
    if (this.configs.has(config.slug)) {
      this.updateTask(config);
      return 'updated';
    }
    this.addTask(config);
    return 'added';
  }

  upsertTasks(configs: Iterable<TaskConfig>): UpsertResult[] {
    return [...configs].map(config => this.upsertTask(config));
  }

  /**
   * Removes the task from the catalog, drops its state and takes it out of
   * today's set.
   * @throws TaskNotFoundError
   */
  removeTask(slug: string): void {
    if (!this.configs.has(slug)) {
      throw new TaskNotFoundError(slug);
    }
    this.configs.delete(slug);
    this.states.delete(slug);
    this.todaysSet.delete(slug);
  }

  /**
   * Fails fast: slugs before the first missing one stay removed in memory.
   */
  removeTasks(slugs: Iterable<string>): void {
    for (const slug of slugs) {
      this.removeTask(slug);
    }
  }

  enableTasks(slugs: Iterable<string>): void {
    for (const slug of slugs) {
      const { config, state } = this.getTask(slug);
      enableTaskConfig(config);
      enableTaskState(state);
    }
  }

  /**
   * Applies `policy` (an open-ended disable by default) and records the
   * effective day as `disabledOn`.
   */
  disableTasks(slugs: Iterable<string>, policy: DisabledPolicy = { kind: 'disabled' }): void {
    for (const slug of slugs) {
      const { config, state } = this.getTask(slug);
      disableTaskConfig(config, { ...policy });
      disableTaskState(state, this.today);
    }
  }

  completeTasks(slugs: Iterable<string>): void {
    for (const slug of slugs) {
      completeTaskState(this.getTask(slug).state);
    }
  }

  /**
   * Completes every task of today's set that is not complete yet.
   * @returns the slugs that were completed
   */
  completeTodaysTasks(): string[] {
    const slugs = this.uncompletedTasks().map(task => task.slug);
    this.completeTasks(slugs);
    return slugs;
  }

  // ==================== Today's set ====================

  todaysTasks(): string[] {
    return this.todaysSet.values();
  }

  isInTodaysTasks(slug: string): boolean {
    return this.todaysSet.has(slug);
  }

  resolveTodaysTasks(): Task[] {
    return this.todaysSet.values().map(slug => this.getTask(slug));
  }

  completedTasks(): Task[] {
    return this.resolveTodaysTasks().filter(task => task.state.completed);
  }

  uncompletedTasks(): Task[] {
    return this.resolveTodaysTasks().filter(task => !task.state.completed);
  }

  /** Sum of the spoon costs of today's set */
  todaysSpoons(): number {
    return this.resolveTodaysTasks().reduce((sum, task) => sum + task.config.spoons, 0);
  }

  clearTodaysTasks(): void {
    this.todaysSet.clear();
  }

  /**
   * Puts a task into today's set as a fresh selection.
   * @throws TaskNotFoundError
   */
  chooseTask(slug: string): void {
    const { state } = this.getTask(slug);
    chooseTaskState(state, this.today);
    this.todaysSet.add(slug);
  }

  /**
   * Takes the given slugs (all of today's set when omitted) out of today's
   * set without drawing replacements.
   *
   * @returns the slugs that were in today's set
   * @throws TaskNotFoundError for a slug that is not in the catalog
   */
  resetTodaysTasks(slugs?: Iterable<string>): string[] {
    if (slugs === undefined) {
      const removed = this.todaysSet.values();
      this.todaysSet.clear();
      return removed;
    }
    const removed: string[] = [];
    for (const slug of slugs) {
      if (!this.configs.has(slug)) {
        throw new TaskNotFoundError(slug);
      }
      if (this.todaysSet.delete(slug)) {
        removed.push(slug);
      }
    }
    return removed;
  }

  // ==================== Days ====================

  /** The effective day, fixed for the lifetime of this runtime state */
  todaysDate(): PlainDate {
    return this.today;
  }

  /** Whole days from `date` to the effective day */
  daysSinceToday(date: PlainDate): number {
    return daysBetween(date, this.today);
  }

  /** Effective day of the last draw under the current cut-off */
  lastGeneratedDate(): PlainDate {
    return dateWithCutOff(new Date(this.lastGenerated), parseTimeOfDay(this.cutOffValue));
  }

  get lastGeneratedAt(): string {
    return this.lastGenerated;
  }

  markGenerated(): void {
    this.lastGenerated = this.clock().toISOString();
  }

  // ==================== Settings ====================

  get cutOff(): string {
    return this.cutOffValue;
  }

  get selection(): SelectionPolicy {
    return { ...this.selectionValue };
  }

  /**
   * Takes effect for `lastGeneratedDate()` at once; the effective day of the
   * running process stays as it was.
   * @throws ValidationError for anything but `HH:MM`
   */
  setCutOff(cutOff: string): void {
    parseTimeOfDay(cutOff);
    this.cutOffValue = cutOff;
  }

  /**
   * @throws ValidationError when the target is not a non-negative integer
   */
  setSelection(selection: SelectionPolicy): void {
    const target = selection.mode === 'count' ? selection.dailyTasks : selection.dailySpoons;
    if (!Number.isInteger(target) || target < 0) {
      const field = selection.mode === 'count' ? 'dailyTasks' : 'dailySpoons';
      throw new ValidationError(`Invalid ${field}: must be a non-negative integer`, [
        { field, message: 'must be a non-negative integer', value: target },
      ]);
    }
    this.selectionValue = { ...selection };
  }

  // ==================== Orphans ====================

  orphans(): Orphans {
    return {
      states: [...this.orphanedStates.keys()].sort(),
      todaysTasks: [...this.orphanedTodaysTasks].sort(),
    };
  }

  /**
   * Forgets orphaned state entries so the next save drops them.
   * @returns the purged slugs
   */
  purgeOrphans(): string[] {
    const purged = [...this.orphanedStates.keys()].sort();
    this.orphanedStates.clear();
    this.orphanedTodaysTasks.length = 0;
    return purged;
  }
}
