import { createRuntimeState, resolveDocumentPaths } from './fs_runtime_state';

jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
    writeFile: jest.fn(),
    mkdir: jest.fn(),
  },
}));

import { promises as fs } from 'fs';

const mockedFs = fs as jest.Mocked<typeof fs>;

describe('resolveDocumentPaths', () => {
  it('should default to the XDG directories under the home directory', () => {
    expect(resolveDocumentPaths({}, {}, '/home/test')).toEqual({
      configPath: '/home/test/.config/dailydraw/config.yaml',
      statePath: '/home/test/.cache/dailydraw/state.yaml',
    });
  });

  it('should follow XDG_CONFIG_HOME and XDG_CACHE_HOME', () => {
    const env = { XDG_CONFIG_HOME: '/xdg/config', XDG_CACHE_HOME: '/xdg/cache' };

    expect(resolveDocumentPaths({}, env, '/home/test')).toEqual({
      configPath: '/xdg/config/dailydraw/config.yaml',
      statePath: '/xdg/cache/dailydraw/state.yaml',
    });
  });

  it('should prefer the dailydraw variables over XDG', () => {
    const env = {
      XDG_CONFIG_HOME: '/xdg/config',
      DAILYDRAW_CONFIG: '/etc/dailydraw.yaml',
      DAILYDRAW_STATE: '/var/dailydraw/state.yaml',
    };

    expect(resolveDocumentPaths({}, env, '/home/test')).toEqual({
      configPath: '/etc/dailydraw.yaml',
      statePath: '/var/dailydraw/state.yaml',
    });
  });

  it('should prefer explicit overrides over everything', () => {
    const env = { DAILYDRAW_CONFIG: '/etc/dailydraw.yaml' };

    expect(resolveDocumentPaths({ config: '/tmp/c.yaml', state: '/tmp/s.yaml' }, env, '/home/test')).toEqual({
      configPath: '/tmp/c.yaml',
      statePath: '/tmp/s.yaml',
    });
  });
});

describe('createRuntimeState', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should write default documents on first run', async () => {
    mockedFs.readFile.mockRejectedValue(Object.assign(new Error('ENOENT'), { code: 'ENOENT' }));
    mockedFs.mkdir.mockResolvedValue(undefined);
    mockedFs.writeFile.mockResolvedValue(undefined);

    const runtime = await createRuntimeState(
      { configPath: '/home/test/.config/dailydraw/config.yaml', statePath: '/home/test/.cache/dailydraw/state.yaml' },
      { clock: () => new Date(2026, 9, 19, 10, 0) },
    );

    expect(runtime.taskSlugs()).toEqual([]);
    expect(runtime.configLocation).toBe('/home/test/.config/dailydraw/config.yaml');
    expect(mockedFs.writeFile.mock.calls.map(call => call[0])).toEqual([
      '/home/test/.config/dailydraw/config.yaml',
      '/home/test/.cache/dailydraw/state.yaml',
    ]);
  });
});
