import { Logger, type RuntimeState } from '@dailydraw/core';
import { createRuntimeState, resolveDocumentPaths } from '@dailydraw/core/fs';
import type { DocumentPathOverrides, DocumentPaths } from '@dailydraw/core/fs';

/**
 * Dependency Injection Service for the dailydraw CLI
 *
 * Resolves the document locations once per invocation and hands every
 * command the same loaded runtime state.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private runtimeState: RuntimeState | null = null;
  private pathOverrides: DocumentPathOverrides = {};
  private readonly logger: Logger.Logger = Logger.createLogger('[dailydraw] ');

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the singleton (tests only)
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Applies `--config` / `--state`; forgets any runtime state already loaded
   */
  configure(overrides: DocumentPathOverrides): void {
    this.pathOverrides = { ...overrides };
    this.runtimeState = null;
  }

  getDocumentPaths(): DocumentPaths {
    return resolveDocumentPaths(this.pathOverrides);
  }

  getLogger(): Logger.Logger {
    return this.logger;
  }

  /**
   * Loads (once) the runtime state over the YAML documents
   */
  async getRuntimeState(): Promise<RuntimeState> {
    if (this.runtimeState) {
      return this.runtimeState;
    }

    const paths = this.getDocumentPaths();
    this.logger.debug(`Config document: ${paths.configPath}`);
    this.logger.debug(`State document: ${paths.statePath}`);

    const runtimeState = await createRuntimeState(paths);

    const orphans = runtimeState.orphans();
    if (orphans.states.length > 0) {
      this.logger.warn(
        `State has entries for unknown task(s): ${orphans.states.join(', ')}. Run 'dailydraw tasks prune' to remove them.`,
      );
    }
    if (orphans.todaysTasks.length > 0) {
      this.logger.warn(`Dropped unknown task(s) from today's set: ${orphans.todaysTasks.join(', ')}`);
    }

    this.runtimeState = runtimeState;
    return runtimeState;
  }
}
