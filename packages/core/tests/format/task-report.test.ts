import { describe, it, expect } from 'vitest';
import { generateTaskReport } from '../../src/format/task-report.js';
import { Task } from '../../src/task.js';

const TODAY = '2026-05-10';

const records = [
  new Task({ title: 'done', status: 'completed', dueDate: '2026-05-01' }),
  new Task({ title: 'late', dueDate: '2026-05-01' }),
  new Task({ title: 'open' }),
  new Task({ title: 'dropped', status: 'cancelled' }),
].map(t => t.toRecord());

describe('generateTaskReport', () => {
  it('counts across all records', () => {
    const report = generateTaskReport(records, undefined, TODAY);
    expect(report.total).toBe(4);
    expect(report.completed).toBe(1);
    expect(report.pending).toBe(2);
    expect(report.overdue).toBe(1);
    expect(report.completionRate).toBe(25);
    expect(report.tasks.map(r => r.title)).toEqual(['done', 'late', 'open', 'dropped']);
  });

  it('selects records by filter', () => {
    expect(generateTaskReport(records, 'completed', TODAY).tasks.map(r => r.title)).toEqual(['done']);
    expect(generateTaskReport(records, 'pending', TODAY).tasks.map(r => r.title)).toEqual(['late', 'open']);
    expect(generateTaskReport(records, 'overdue', TODAY).tasks.map(r => r.title)).toEqual(['late']);
  });

  it('rounds the completion rate with ties to even', () => {
    const many = Array.from({ length: 16 }, (_, i) =>
      new Task({ title: `t${i}`, status: i === 0 ? 'completed' : 'pending' }).toRecord());
    expect(generateTaskReport(many, undefined, TODAY).completionRate).toBe(6.2);
  });

  it('handles an empty list', () => {
    expect(generateTaskReport([], undefined, TODAY)).toEqual({
      total: 0, completed: 0, pending: 0, overdue: 0, completionRate: 0, tasks: [],
    });
  });
});
