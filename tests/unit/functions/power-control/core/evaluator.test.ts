/**
 * Unit tests for core/evaluator.ts
 */

import { describe, it, expect, vi } from 'vitest';
import { createInstance, MONDAY_AFTERNOON } from '../../../../helpers/fixtures';

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { evaluateInstance } from '@functions/power-control/core/evaluator';

const config = { protectedOwners: ['carol@example.com'], tz: 'Etc/UTC' };

describe('evaluateInstance', () => {
  it('should allow a running instance inside its schedule', () => {
    expect(evaluateInstance(createInstance(), config, MONDAY_AFTERNOON)).toBe('ALLOWED');
  });

  it.each(['stopped', 'stopping', 'pending', 'terminated', 'unknown'])(
    'should skip an instance in state %s',
    (state) => {
      const instance = createInstance({ state, owner: '', runningSchedule: 'garbage' });

      expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('NOT_RUNNING');
    }
  );

  it('should skip an instance without an owner before looking at its schedule', () => {
    const instance = createInstance({ owner: '', runningSchedule: 'garbage' });

    expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('NO_OWNER');
  });

  it('should skip an instance owned by a protected owner', () => {
    const instance = createInstance({
      owner: 'carol@example.com',
      runningSchedule: '08:00:12:00:1-5',
    });

    expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('PROTECTED_OWNER');
  });

  it.each(['', '24/7', '08:00:18:00', '18:00:08:00:1-5'])(
    'should report schedule %j as malformed',
    (runningSchedule) => {
      const instance = createInstance({ runningSchedule });

      expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('MALFORMED');
    }
  );

  it('should report an unknown schedule time zone', () => {
    const instance = createInstance({ runningScheduleTz: 'Mars/Olympus_Mons' });

    expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('INVALID_ZONE');
  });

  it('should report a day outside the schedule', () => {
    const instance = createInstance({ runningSchedule: '08:00:18:00:6-7' });

    expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('DAY_MISMATCH');
  });

  it('should report a time outside the schedule', () => {
    const instance = createInstance({ runningSchedule: '08:00:12:00:1-5' });

    expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('TIME_MISMATCH');
  });

  it('should evaluate in the instance time zone', () => {
    // 06:05 Monday in Los Angeles
    const instance = createInstance({ runningScheduleTz: 'America/Los_Angeles' });

    expect(evaluateInstance(instance, config, MONDAY_AFTERNOON)).toBe('TIME_MISMATCH');
  });

  it('should fall back to the configured time zone', () => {
    // 23:05 Monday in Tokyo
    const instance = createInstance({ runningSchedule: '08:00:23:30:1-5' });

    expect(
      evaluateInstance(instance, { ...config, tz: 'Asia/Tokyo' }, MONDAY_AFTERNOON)
    ).toBe('ALLOWED');
    expect(
      evaluateInstance(createInstance(), { ...config, tz: 'Asia/Tokyo' }, MONDAY_AFTERNOON)
    ).toBe('TIME_MISMATCH');
  });
});
