/**
 * Base Command Class for the dailydraw CLI
 *
 * Provides common functionality and enforces standards across all commands:
 * one place for dependency access, error rendering and success output.
 */

import { Errors, Logger } from '@dailydraw/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();
  protected readonly logger: Logger.Logger = this.dependencyService.getLogger();

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        ...(Errors.isDailyDrawError(error) ? { code: error.code } : {}),
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Renders any thrown value through handleError
   */
  protected handleCommandError(error: unknown, options: TOptions): void {
    if (error instanceof Error) {
      this.handleError(error.message, options, error);
    } else {
      this.handleError(String(error), options);
    }
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !isQuiet) {
      console.log(`✅ ${message}`);
    }
  }
}
