/**
 * Options every dailydraw subcommand accepts
 */
export interface BaseCommandOptions {
  /** Print `{ success, data }` JSON instead of text */
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}
