import { NextRequest } from 'next/server';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { POST } from './route';
import { DELETE } from './[id]/route';

const mocks = vi.hoisted(() => ({
  getCurrentSession: vi.fn(),
  query: vi.fn(),
}));

vi.mock('@/lib/session', () => ({ getCurrentSession: mocks.getCurrentSession }));
vi.mock('@/lib/db', () => ({ getPool: () => ({ query: mocks.query }) }));

const CSRF_TOKEN = 'test-csrf-token';

function postRequest(body: unknown) {
  return new NextRequest('http://localhost/api/inventory/categories', {
    method: 'POST',
    headers: { 'content-type': 'application/json', 'x-csrf-token': CSRF_TOKEN },
    body: JSON.stringify(body),
  });
}

beforeEach(() => {
  mocks.getCurrentSession.mockReset();
  mocks.query.mockReset();
  mocks.getCurrentSession.mockResolvedValue({
    user: { id: '7', role: 'admin', name: 'Erika Muster', email: 'erika@example.com' },
    csrfToken: CSRF_TOKEN,
    expires: '2099-01-01T00:00:00.000Z',
  });
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

describe('POST /api/inventory/categories', () => {
  it('adds the category and returns the active map', async () => {
    mocks.query
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 8 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 92 })
      .mockResolvedValueOnce([
        { key_name: 'office_supplies', display_name: 'Bürobedarf' },
        { key_name: 'tools', display_name: 'Werkzeug' },
      ]);

    const res = await POST(postRequest({ key_name: 'office_supplies', display_name: 'Bürobedarf' }));

    expect(res.status).toBe(201);
    await expect(res.json()).resolves.toEqual({
      success: true,
      message: 'Kategorie erfolgreich hinzugefügt',
      category: { id: 8, key_name: 'office_supplies', display_name: 'Bürobedarf' },
      categories: { office_supplies: 'Bürobedarf', tools: 'Werkzeug' },
    });
  });

  it('answers 400 for a malformed key', async () => {
    const res = await POST(postRequest({ key_name: 'Office Supplies', display_name: 'Bürobedarf' }));

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({
      success: false,
      message: 'Schlüsselname darf nur Kleinbuchstaben und Unterstriche enthalten',
    });
    expect(mocks.query).not.toHaveBeenCalled();
  });
});

describe('DELETE /api/inventory/categories/[id]', () => {
  function deleteRequest() {
    return new NextRequest('http://localhost/api/inventory/categories/2', {
      method: 'DELETE',
      headers: { 'x-csrf-token': CSRF_TOKEN },
    });
  }

  it('answers 404 for an unknown category', async () => {
    mocks.query.mockResolvedValueOnce([]);

    const res = await DELETE(deleteRequest(), { params: Promise.resolve({ id: '2' }) });

    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({ success: false, message: 'Kategorie nicht gefunden' });
  });

  it('rejects id zero', async () => {
    const res = await DELETE(deleteRequest(), { params: Promise.resolve({ id: '0' }) });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ success: false, message: 'Ungültige Kategorie-ID' });
  });

  it('answers 500 for unexpected failures', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mocks.query.mockRejectedValueOnce(new Error('syntax error'));

    const res = await DELETE(deleteRequest(), { params: Promise.resolve({ id: '2' }) });

    expect(res.status).toBe(500);
    await expect(res.json()).resolves.toEqual({ success: false, message: 'Interner Serverfehler' });
  });
});
