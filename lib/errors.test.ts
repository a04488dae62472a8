import { describe, expect, it } from 'vitest';
import { isDatabaseUnavailable } from './errors';

describe('isDatabaseUnavailable', () => {
  it('recognizes connection failures', () => {
    expect(isDatabaseUnavailable({ code: 'ECONNREFUSED' })).toBe(true);
    expect(isDatabaseUnavailable({ code: 'ER_GET_CONNECTION_TIMEOUT' })).toBe(true);
    expect(isDatabaseUnavailable(Object.assign(new Error('pool closed'), { fatal: true }))).toBe(true);
  });

  it('ignores query-level errors and non-objects', () => {
    expect(isDatabaseUnavailable({ code: 'ER_DUP_ENTRY', fatal: false })).toBe(false);
    expect(isDatabaseUnavailable(new Error('boom'))).toBe(false);
    expect(isDatabaseUnavailable('ECONNREFUSED')).toBe(false);
    expect(isDatabaseUnavailable(null)).toBe(false);
  });
});
