import { describe, it, expect } from 'vitest';
import { formatTaskDisplay, formatTaskList, getShortId } from '../../src/format/task-display.js';
import { Task } from '../../src/task.js';

const TODAY = '2026-05-10';

function record(overrides: Partial<ConstructorParameters<typeof Task>[0]> = {}) {
  return new Task({ title: 'Task', id: '0123456789abcdef', ...overrides }).toRecord();
}

describe('formatTaskDisplay', () => {
  it('shows status and priority markers', () => {
    expect(formatTaskDisplay(record({ priority: 'high' }), { today: TODAY })).toBe('[□] ‼️ Task');
    expect(formatTaskDisplay(record({ priority: 'low', status: 'completed' }), { today: TODAY })).toBe('[✓] ⭘ Task');
    expect(formatTaskDisplay(record({ status: 'cancelled' }), { today: TODAY })).toBe('[✗] ⬤ Task');
  });

  it('labels future and overdue due dates', () => {
    expect(formatTaskDisplay(record({ dueDate: '2026-05-11' }), { today: TODAY })).toBe('[□] ⬤ Task (Due: 2026-05-11)');
    expect(formatTaskDisplay(record({ dueDate: '2026-05-09' }), { today: TODAY })).toBe('[□] ⬤ Task (OVERDUE: 2026-05-09)');
    expect(formatTaskDisplay(record({ dueDate: '2026-05-09', status: 'completed' }), { today: TODAY }))
      .toBe('[✓] ⬤ Task (Due: 2026-05-09)');
  });

  it('adds category, short id and description', () => {
    const line = formatTaskDisplay(record({ category: 'work', description: 'More detail' }), {
      today: TODAY, showId: true, showDescription: true,
    });
    expect(line).toBe('[□] ⬤ Task #work [ID: 01234567]\n    More detail');
  });

  it('fills defaults for a sparse record', () => {
    expect(formatTaskDisplay({}, { today: TODAY })).toBe('[□] ⬤ Untitled');
  });
});

describe('formatTaskList', () => {
  it('reports an empty list', () => {
    expect(formatTaskList([])).toBe('No tasks found.');
  });

  it('joins lines', () => {
    const text = formatTaskList([record({ title: 'A' }), record({ title: 'B' })], { today: TODAY });
    expect(text).toBe('[□] ⬤ A\n[□] ⬤ B');
  });
});

describe('getShortId', () => {
  it('keeps the first eight characters', () => {
    expect(getShortId('0123456789abcdef')).toBe('01234567');
  });
});
