import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Capability } from '@/lib/constants/enums';
import { enforceAccess, requireCapability } from './guards';

const mocks = vi.hoisted(() => ({
  getCurrentSession: vi.fn(),
  redirect: vi.fn((url: string) => {
    throw new Error(`NEXT_REDIRECT:${url}`);
  }),
}));

vi.mock('@/lib/session', () => ({ getCurrentSession: mocks.getCurrentSession }));
vi.mock('next/navigation', () => ({ redirect: mocks.redirect }));

function session(role: string) {
  return {
    user: { id: '7', role, name: 'Erika Muster', email: 'erika@example.com' },
    csrfToken: 'test-csrf-token',
    expires: '2099-01-01T00:00:00.000Z',
  };
}

beforeEach(() => {
  mocks.getCurrentSession.mockReset();
  mocks.redirect.mockClear();
});

describe('enforceAccess', () => {
  it('lets allowed requests through', () => {
    expect(() => enforceAccess(true)).not.toThrow();
    expect(mocks.redirect).not.toHaveBeenCalled();
  });

  it('redirects to the landing page', () => {
    expect(() => enforceAccess(false)).toThrow('NEXT_REDIRECT:/backoffice');
  });
});

describe('requireCapability', () => {
  it('sends signed-out visitors to the login page', async () => {
    mocks.getCurrentSession.mockResolvedValue(null);
    await expect(requireCapability(Capability.VIEW_INVENTORY_AUDIT)).rejects.toThrow('NEXT_REDIRECT:/login');
  });

  it('sends users without the capability to the landing page', async () => {
    mocks.getCurrentSession.mockResolvedValue(session('ressortleiter'));
    await expect(requireCapability(Capability.VIEW_INVENTORY_AUDIT)).rejects.toThrow(
      'NEXT_REDIRECT:/backoffice'
    );
  });

  it('returns the session when allowed', async () => {
    const current = session('alumni-vorstand');
    mocks.getCurrentSession.mockResolvedValue(current);
    await expect(requireCapability(Capability.VALIDATE_ALUMNI)).resolves.toBe(current);
  });
});
