import { describe, it, expect } from 'vitest';
import { normalizeNewTask, sortTasksForDisplay, nextIdAfter, createTask } from '../../src/store/task-helpers.js';
import { ValidationError } from '../../src/errors.js';
import type { Task } from '../../src/types/task.js';

function task(id: number, overrides: Partial<Task> = {}): Task {
  return {
    ...createTask(id, normalizeNewTask({ title: `Task ${id}` }), new Date(Date.UTC(2026, 0, id))),
    ...overrides,
  };
}

describe('normalizeNewTask', () => {
  it('applies the defaults', () => {
    expect(normalizeNewTask({ title: 'x' })).toEqual({
      title: 'x',
      description: '',
      category: 'General',
      priority: 'Medium',
      dueDate: null,
    });
  });

  it('treats a blank due date as none', () => {
    expect(normalizeNewTask({ title: 'x', dueDate: ' ' }).dueDate).toBeNull();
  });

  it('throws ValidationError for an empty title', () => {
    expect(() => normalizeNewTask({ title: '' })).toThrow(ValidationError);
  });
});

describe('nextIdAfter', () => {
  it('is 1 for an empty list and max + 1 otherwise', () => {
    expect(nextIdAfter([])).toBe(1);
    expect(nextIdAfter([task(2), task(9), task(4)])).toBe(10);
  });
});

describe('sortTasksForDisplay', () => {
  it('puts incomplete first, then by priority, then oldest first', () => {
    const tasks = [
      task(1, { priority: 'Low' }),
      task(2, { priority: 'High', completed: true }),
      task(3, { priority: 'High' }),
      task(4, { priority: 'Medium' }),
      task(5, { priority: 'High' }),
    ];
    expect(sortTasksForDisplay(tasks).map(t => t.id)).toEqual([3, 5, 4, 1, 2]);
  });

  it('does not reorder its input', () => {
    const tasks = [task(1, { priority: 'Low' }), task(2, { priority: 'High' })];
    sortTasksForDisplay(tasks);
    expect(tasks.map(t => t.id)).toEqual([1, 2]);
  });
});
