import { describe, it, expect } from 'vitest';
import {
  normalizeTitle, normalizeDescription, normalizeDeadline, requireBoolean,
  isWithinUrgencyWindow, daysUntil, deadlineStatus, toTaskView, matchesQuery,
} from '../../src/queries/task-helpers.js';
import { ValidationError } from '../../src/errors.js';
import type { Task } from '../../src/types/task.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function task(overrides: Partial<Task> = {}): Task {
  return {
    id: 1,
    title: 'Write report',
    description: null,
    urgent: false,
    important: true,
    done: false,
    deadlineAt: null,
    createdAt: '2026-03-01T09:00:00.000Z',
    completedAt: null,
    ...overrides,
  };
}

describe('normalizeTitle', () => {
  it('trims the title', () => {
    expect(normalizeTitle('  Pay taxes  ')).toBe('Pay taxes');
  });

  it('rejects empty and whitespace-only titles', () => {
    expect(() => normalizeTitle('')).toThrow(ValidationError);
    expect(() => normalizeTitle(' \n\t')).toThrow('Title must not be empty');
  });

  it('rejects non-strings', () => {
    expect(() => normalizeTitle(42)).toThrow('Title must be a string');
  });
});

describe('normalizeDescription', () => {
  it('stores blank descriptions as null', () => {
    expect(normalizeDescription('   ')).toBeNull();
    expect(normalizeDescription(undefined)).toBeNull();
    expect(normalizeDescription(' notes ')).toBe('notes');
  });
});

describe('normalizeDeadline', () => {
  it('canonicalizes valid timestamps', () => {
    expect(normalizeDeadline('2026-03-12T08:00:00+02:00')).toBe('2026-03-12T06:00:00.000Z');
  });

  it('treats null and blank as no deadline', () => {
    expect(normalizeDeadline(null)).toBeNull();
    expect(normalizeDeadline('')).toBeNull();
  });

  it('rejects garbage with the field name', () => {
    try {
      normalizeDeadline('next tuesday-ish');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: 'deadlineAt', message: 'Invalid deadline: next tuesday-ish' });
    }
  });
});

describe('requireBoolean', () => {
  it('passes booleans through and rejects everything else', () => {
    expect(requireBoolean(false, 'urgent')).toBe(false);
    expect(() => requireBoolean('yes', 'urgent')).toThrow('urgent must be a boolean');
  });
});

describe('isWithinUrgencyWindow', () => {
  it('is true up to and including the window edge', () => {
    expect(isWithinUrgencyWindow('2026-03-13T12:00:00.000Z', NOW, 3)).toBe(true);
    expect(isWithinUrgencyWindow('2026-03-13T12:00:00.001Z', NOW, 3)).toBe(false);
  });

  it('is true for deadlines already passed', () => {
    expect(isWithinUrgencyWindow('2026-03-01T00:00:00.000Z', NOW, 3)).toBe(true);
  });
});

describe('daysUntil', () => {
  it('floors to whole days', () => {
    expect(daysUntil('2026-03-12T11:59:59.000Z', NOW)).toBe(1);
    expect(daysUntil('2026-03-12T12:00:00.000Z', NOW)).toBe(2);
    expect(daysUntil('2026-03-10T11:00:00.000Z', NOW)).toBe(-1);
  });
});

describe('deadlineStatus', () => {
  it('is null without a deadline', () => {
    expect(deadlineStatus(task(), NOW)).toBeNull();
  });

  it('reports pending tasks relative to now', () => {
    expect(deadlineStatus(task({ deadlineAt: '2026-03-10T20:00:00.000Z' }), NOW)).toBe('Due within a day');
    expect(deadlineStatus(task({ deadlineAt: '2026-03-11T11:00:00.000Z' }), NOW)).toBe('Due within a day');
    expect(deadlineStatus(task({ deadlineAt: '2026-03-11T13:00:00.000Z' }), NOW)).toBe('1 day left');
    expect(deadlineStatus(task({ deadlineAt: '2026-03-15T12:00:00.000Z' }), NOW)).toBe('5 days left');
    expect(deadlineStatus(task({ deadlineAt: '2026-03-10T11:00:00.000Z' }), NOW)).toBe('Overdue');
  });

  it('reports done tasks against their completion time', () => {
    const deadlineAt = '2026-03-08T00:00:00.000Z';
    expect(deadlineStatus(task({ deadlineAt, done: true, completedAt: '2026-03-07T10:00:00.000Z' }), NOW))
      .toBe('Completed on time');
    expect(deadlineStatus(task({ deadlineAt, done: true, completedAt: '2026-03-09T10:00:00.000Z' }), NOW))
      .toBe('Completed late');
  });
});

describe('toTaskView', () => {
  it('adds quadrant and deadline fields without touching the input', () => {
    const input = task({ urgent: true, deadlineAt: '2026-03-13T12:00:00.000Z' });
    const view = toTaskView(input, NOW);

    expect(view).toMatchObject({
      id: 1,
      quadrant: 'Q1',
      daysUntilDeadline: 3,
      statusMessage: '3 days left',
    });
    expect(view).not.toBe(input);
    expect(input).not.toHaveProperty('quadrant');
  });

  it('has no daysUntilDeadline for done tasks', () => {
    const view = toTaskView(task({
      deadlineAt: '2026-03-13T12:00:00.000Z', done: true, completedAt: '2026-03-09T00:00:00.000Z',
    }), NOW);
    expect(view.daysUntilDeadline).toBeNull();
    expect(view.statusMessage).toBe('Completed on time');
  });
});

describe('matchesQuery', () => {
  it('matches title or description case-insensitively', () => {
    expect(matchesQuery(task({ title: 'Call the BANK' }), 'bank')).toBe(true);
    expect(matchesQuery(task({ description: 'Ask about Überweisung' }), 'überweisung')).toBe(true);
    expect(matchesQuery(task(), 'groceries')).toBe(false);
  });
});
