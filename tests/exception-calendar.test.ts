import { describe, it, expect, beforeEach } from 'vitest';
import { DuplicateExceptionError, NotFoundError, ValidationError } from '../src/domain/errors.js';
import { createTestEngine, type TestEngine } from './helpers/engine-fixture.js';

describe('ExceptionCalendarService', () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
  });

  it('adds a date and reports it as contained', async () => {
    const created = await t.engine.exceptions.add('2026-12-25', 'Holiday');
    expect(created).toMatchObject({ date: '2026-12-25', reason: 'Holiday', active: true });
    expect(await t.engine.exceptions.contains('2026-12-25')).toBe(true);
    expect(await t.engine.exceptions.contains('2026-12-26')).toBe(false);
  });

  it('defaults the reason to an empty string', async () => {
    const created = await t.engine.exceptions.add('2026-12-31');
    expect(created.reason).toBe('');
  });

  it('rejects a duplicate date', async () => {
    await t.engine.exceptions.add('2026-12-25');
    await expect(t.engine.exceptions.add('2026-12-25', 'again')).rejects.toThrow(DuplicateExceptionError);
  });

  it('rejects malformed dates', async () => {
    await expect(t.engine.exceptions.add('25/12/2026')).rejects.toThrow(ValidationError);
    await expect(t.engine.exceptions.add('2026-02-29')).rejects.toThrow(ValidationError);
  });

  it('does not count an inactive exception', async () => {
    await t.engine.exceptions.add('2026-12-25');
    await t.engine.exceptions.update('2026-12-25', { active: false });
    expect(await t.engine.exceptions.contains('2026-12-25')).toBe(false);
  });

  it('updates the reason', async () => {
    await t.engine.exceptions.add('2026-12-25', 'Holiday');
    const updated = await t.engine.exceptions.update('2026-12-25', { reason: 'Office closed' });
    expect(updated).toMatchObject({ reason: 'Office closed', active: true });
  });

  it('throws NotFoundError when updating or removing an absent date', async () => {
    await expect(t.engine.exceptions.update('2026-07-04', { reason: 'x' })).rejects.toThrow(NotFoundError);
    await expect(t.engine.exceptions.remove('2026-07-04')).rejects.toThrow(NotFoundError);
  });

  it('removes a date', async () => {
    await t.engine.exceptions.add('2026-12-25');
    await t.engine.exceptions.remove('2026-12-25');
    expect(await t.engine.exceptions.contains('2026-12-25')).toBe(false);
    expect(t.audit.entries.map((e) => e.event_type)).toEqual(['exception_date.created', 'exception_date.deleted']);
  });

  it('lists dates in order, optionally within a range', async () => {
    await t.engine.exceptions.add('2026-12-31');
    await t.engine.exceptions.add('2026-01-01');
    await t.engine.exceptions.add('2026-07-04');

    expect((await t.engine.exceptions.list()).map((e) => e.date))
      .toEqual(['2026-01-01', '2026-07-04', '2026-12-31']);
    expect((await t.engine.exceptions.list({ startDate: '2026-06-01', endDate: '2026-12-31' })).map((e) => e.date))
      .toEqual(['2026-07-04', '2026-12-31']);
  });

  it('returns only active dates for slot generation', async () => {
    await t.engine.exceptions.add('2026-03-02');
    await t.engine.exceptions.add('2026-03-03');
    await t.engine.exceptions.update('2026-03-03', { active: false });

    const active = await t.engine.exceptions.activeDates({ startDate: '2026-03-01', endDate: '2026-03-07' });
    expect([...active]).toEqual(['2026-03-02']);
  });
});
