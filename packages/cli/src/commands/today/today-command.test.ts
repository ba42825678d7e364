// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { RuntimeState, createTaskConfig, type ConfigDocument, type StateDocument } from '@dailydraw/core';
import { MemoryConfigStore, MemoryStateStore } from '@dailydraw/core/memory';
import { TodayCommand } from './today-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('TodayCommand', () => {
  let configStore: MemoryConfigStore;
  let stateStore: MemoryStateStore;

  const now = new Date(2026, 9, 19, 10, 0);
  const clock = () => now;

  function config(overrides: Partial<ConfigDocument> = {}): ConfigDocument {
    return {
      cutOff: '04:00',
      selection: { mode: 'count', dailyTasks: 1 },
      tasks: [
        createTaskConfig('Read', { disabled: { kind: 'disabled' } }),
        createTaskConfig('Walk'),
      ],
      ...overrides,
    };
  }

  function state(overrides: Partial<StateDocument> = {}): StateDocument {
    return {
      lastGenerated: new Date(2026, 9, 18, 10, 0).toISOString(),
      tasks: {
        read: { completed: false, timesCompleted: 0 },
        walk: { completed: true, timesCompleted: 1, lastChosen: '2026-10-18' },
      },
      todaysTasks: ['walk'],
      ...overrides,
    };
  }

  async function commandOver(configDocument: ConfigDocument, stateDocument: StateDocument): Promise<TodayCommand> {
    configStore.setConfig(configDocument);
    stateStore.setState(stateDocument);
    const runtime = await RuntimeState.load(configStore, stateStore, { clock });

    const mockDependencyService = {
      getRuntimeState: jest.fn().mockResolvedValue(runtime),
      getLogger: jest.fn().mockReturnValue({ debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() })
    };
    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    return new TodayCommand();
  }

  function printed(): unknown[] {
    return mockConsoleLog.mock.calls.map(call => call[0]);
  }

  beforeEach(() => {
    jest.clearAllMocks();
    configStore = new MemoryConfigStore();
    stateStore = new MemoryStateStore();
  });

  describe('get', () => {
    it('should draw a new set when the day has turned over and save it', async () => {
      const command = await commandOver(config(), state());

      await command.executeGet({});

      expect(printed()).toEqual(['📅 Today (2026-10-19):', '🔄 walk - Walk']);
      expect(stateStore.getState()).toEqual({
        lastGenerated: now.toISOString(),
        tasks: {
          read: { completed: false, timesCompleted: 0 },
          walk: { completed: false, timesCompleted: 1, lastChosen: '2026-10-19' },
        },
        todaysTasks: ['walk'],
      });
    });

    it('should not save when today\'s set is already full', async () => {
      const command = await commandOver(config(), state({
        lastGenerated: new Date(2026, 9, 19, 8, 0).toISOString(),
      }));
      const saveState = jest.spyOn(stateStore, 'saveState');

      await command.executeGet({});

      expect(saveState).not.toHaveBeenCalled();
      expect(printed()).toEqual(['📅 Today (2026-10-19):', '✅ walk - Walk']);
    });

    it('should save the emptied set when a new day leaves nothing to draw', async () => {
      const command = await commandOver(
        config({
          tasks: [
            createTaskConfig('Read', { disabled: { kind: 'disabled' } }),
            createTaskConfig('Walk', { minFrequency: 3 }),
          ],
        }),
        state({
          tasks: { walk: { completed: false, timesCompleted: 1, lastChosen: '2026-10-18' } },
        }),
      );

      await command.executeGet({});

      expect(printed()).toEqual(['📭 Nothing drawn for today.']);
      expect(stateStore.getState()).toEqual({
        lastGenerated: now.toISOString(),
        tasks: {
          read: { completed: false, timesCompleted: 0 },
          walk: { completed: false, timesCompleted: 1, lastChosen: '2026-10-18' },
        },
        todaysTasks: [],
      });
    });

    it('should print date, selection and tasks as JSON', async () => {
      const command = await commandOver(config(), state());

      await command.executeGet({ json: true });

      expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
        success: true,
        data: {
          date: '2026-10-19',
          selection: { mode: 'count', dailyTasks: 1 },
          tasks: [{
            slug: 'walk',
            task: 'Walk',
            status: 'in-progress',
            weight: 1,
            spoons: 3,
            disabled: { kind: 'enabled' },
            tags: [],
          }],
        },
      });
    });

    it('should say when nothing could be drawn', async () => {
      const command = await commandOver(
        config({ tasks: [createTaskConfig('Read', { disabled: { kind: 'disabled' } })] }),
        state({ tasks: {}, todaysTasks: [] }),
      );

      await command.executeGet({});

      expect(printed()).toEqual(['📭 Nothing drawn for today.']);
    });

    it('should point to tasks add when the catalog is empty', async () => {
      const command = await commandOver(config({ tasks: [] }), state({ tasks: {}, todaysTasks: [] }));

      await command.executeGet({});

      expect(printed()).toEqual([
        '📭 Nothing drawn for today.',
        "💡 Add tasks with 'dailydraw tasks add <task>'.",
      ]);
    });

    it('should show the spoon budget in spoon mode', async () => {
      const command = await commandOver(
        config({ selection: { mode: 'spoons', dailySpoons: 4 } }),
        state(),
      );

      await command.executeGet({ verbose: true });

      expect(printed()).toEqual([
        '📅 Today (2026-10-19):',
        '🔄 walk - Walk',
        '   Weight: 1, Spoons: 3, Tags: none',
        '🥄 Spoons: 3/4',
      ]);
    });
  });

  describe('refresh', () => {
    const sameDay = new Date(2026, 9, 19, 8, 0).toISOString();

    it('should swap uncompleted tasks for new draws', async () => {
      const command = await commandOver(
        config({ tasks: [createTaskConfig('Read'), createTaskConfig('Walk')] }),
        state({
          lastGenerated: sameDay,
          tasks: { walk: { completed: false, timesCompleted: 1, lastChosen: '2026-10-19' } },
        }),
      );

      await command.executeRefresh([], { quiet: true });

      expect(printed()).toEqual(['read']);
      expect(stateStore.getState()?.todaysTasks).toEqual(['read']);
    });

    it('should leave the set short when no other task can be drawn', async () => {
      const command = await commandOver(config(), state({
        lastGenerated: sameDay,
        tasks: { walk: { completed: false, timesCompleted: 1, lastChosen: '2026-10-19' } },
      }));

      await command.executeRefresh(['walk'], {});

      expect(printed()).toEqual(['📭 Nothing drawn for today.']);
      expect(stateStore.getState()?.todaysTasks).toEqual([]);
    });

    it('should fail for an unknown slug', async () => {
      const command = await commandOver(config(), state({ lastGenerated: sameDay }));

      await command.executeRefresh(['nope'], {});

      expect(mockConsoleError).toHaveBeenCalledWith("❌ No task named 'nope' was found.");
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });

  describe('reset', () => {
    it('should empty today\'s set', async () => {
      const command = await commandOver(config(), state());

      await command.executeReset([], {});

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Removed from today: walk');
      expect(stateStore.getState()?.todaysTasks).toEqual([]);
    });

    it('should report slugs that were not in today\'s set', async () => {
      const command = await commandOver(config(), state());

      await command.executeReset(['read'], { json: true });

      expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
        success: true,
        data: { removed: [] },
      });
      expect(stateStore.getState()?.todaysTasks).toEqual(['walk']);
    });
  });
});
