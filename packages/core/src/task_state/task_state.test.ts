import {
  chooseTaskState,
  completeTaskState,
  createTaskState,
  disableTaskState,
  enableTaskState,
  resetTaskState,
} from './task_state';

describe('TaskState', () => {
  it('should start uncompleted with no history', () => {
    expect(createTaskState()).toEqual({ completed: false, timesCompleted: 0 });
  });

  it('should count every completion and stay completed', () => {
    const state = createTaskState();

    completeTaskState(state);
    completeTaskState(state);

    expect(state.completed).toBe(true);
    expect(state.timesCompleted).toBe(2);
  });

  it('should clear the completion flag on reset without touching the counter', () => {
    const state = createTaskState();
    completeTaskState(state);

    resetTaskState(state);

    expect(state).toEqual({ completed: false, timesCompleted: 1 });
  });

  it('should reset and stamp the day when chosen', () => {
    const state = createTaskState();
    completeTaskState(state);

    chooseTaskState(state, '2026-10-19');

    expect(state).toEqual({ completed: false, timesCompleted: 1, lastChosen: '2026-10-19' });
  });

  it('should set and clear disabledOn', () => {
    const state = createTaskState();

    disableTaskState(state, '2026-10-17');
    expect(state.disabledOn).toBe('2026-10-17');

    enableTaskState(state);
    expect(state).toEqual({ completed: false, timesCompleted: 0 });
  });
});
