import * as os from 'os';
import * as path from 'path';
import { RuntimeState } from '../runtime_state';
import type { RuntimeStateOptions } from '../runtime_state.types';
import { FsConfigStore } from '../../config_store/fs';
import { FsStateStore } from '../../state_store/fs';

const APP_DIRECTORY = 'dailydraw';

export type DocumentPaths = {
  configPath: string;
  statePath: string;
};

export type DocumentPathOverrides = {
  config?: string;
  state?: string;
};

/**
 * Where the config and state documents live.
 *
 * Explicit overrides win, then `DAILYDRAW_CONFIG` / `DAILYDRAW_STATE`, then
 * the XDG base directories (`~/.config` and `~/.cache` when unset).
 */
export function resolveDocumentPaths(
  overrides: DocumentPathOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): DocumentPaths {
  const configHome = env['XDG_CONFIG_HOME'] || path.join(homeDir, '.config');
  const cacheHome = env['XDG_CACHE_HOME'] || path.join(homeDir, '.cache');

  return {
    configPath: path.resolve(
      overrides.config || env['DAILYDRAW_CONFIG'] || path.join(configHome, APP_DIRECTORY, 'config.yaml'),
    ),
    statePath: path.resolve(
      overrides.state || env['DAILYDRAW_STATE'] || path.join(cacheHome, APP_DIRECTORY, 'state.yaml'),
    ),
  };
}

/**
 * Loads a runtime state backed by YAML files.
 */
export function createRuntimeState(paths: DocumentPaths, options: RuntimeStateOptions = {}): Promise<RuntimeState> {
  return RuntimeState.load(new FsConfigStore(paths.configPath), new FsStateStore(paths.statePath), options);
}
