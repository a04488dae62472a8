import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { authorizeApiRequest, clientIp, handleRouteError, parseId } from './api';

const mocks = vi.hoisted(() => ({ getCurrentSession: vi.fn() }));

vi.mock('@/lib/session', () => ({ getCurrentSession: mocks.getCurrentSession }));

function request(headers: Record<string, string>) {
  return new Request('http://localhost/api/inventory/locations', { method: 'POST', headers });
}

beforeEach(() => {
  mocks.getCurrentSession.mockReset();
});

describe('clientIp', () => {
  it('takes the last forwarded address, not one the client prepended', () => {
    expect(clientIp(request({ 'x-forwarded-for': '6.6.6.6, 203.0.113.9' }).headers)).toBe('203.0.113.9');
  });

  it('skips trailing entries that are not addresses', () => {
    expect(clientIp(request({ 'x-forwarded-for': '198.51.100.4, unknown, ' }).headers)).toBe('198.51.100.4');
  });

  it('accepts IPv6 entries', () => {
    expect(clientIp(request({ 'x-forwarded-for': '2001:db8::7' }).headers)).toBe('2001:db8::7');
  });

  it('falls back to X-Real-IP', () => {
    expect(clientIp(request({ 'x-forwarded-for': 'garbage', 'x-real-ip': '192.0.2.10' }).headers)).toBe(
      '192.0.2.10'
    );
  });

  it('returns null without a usable header', () => {
    expect(clientIp(request({}).headers)).toBeNull();
    expect(clientIp(request({ 'x-real-ip': 'localhost' }).headers)).toBeNull();
  });
});

describe('authorizeApiRequest', () => {
  it('returns the numeric user id for an allowed write', async () => {
    mocks.getCurrentSession.mockResolvedValue({
      user: { id: '12', role: 'admin', name: 'Erika Muster', email: 'erika@example.com' },
      csrfToken: 'test-csrf-token',
      expires: '2099-01-01T00:00:00.000Z',
    });

    const result = await authorizeApiRequest(request({ 'x-csrf-token': 'test-csrf-token' }), 'edit_inventory', {
      csrf: true,
    });

    expect(result.ok).toBe(true);
    expect(result.ok ? result.userId : null).toBe(12);
  });
});

describe('handleRouteError', () => {
  it('answers 400 with the issues for invalid input', async () => {
    const parsed = z.object({ name: z.string() }).safeParse({});
    const error = parsed.success ? null : parsed.error;

    const res = handleRouteError(error, 'add something');
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.message).toBe('Ungültige Eingabe');
    expect(body.details[0].path).toEqual(['name']);
  });

  it('answers 503 when the store is unreachable', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = Object.assign(new Error('connect ETIMEDOUT'), { code: 'ETIMEDOUT' });

    const res = handleRouteError(failure, 'list things');

    expect(res.status).toBe(503);
    expect(consoleError).toHaveBeenCalledWith('Failed to list things:', failure);
  });
});

describe('parseId', () => {
  it('accepts positive integers only', () => {
    expect(parseId('42')).toBe(42);
    expect(parseId('0')).toBeNull();
    expect(parseId('-1')).toBeNull();
    expect(parseId('1.5')).toBeNull();
    expect(parseId('abc')).toBeNull();
  });
});
