import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Queryable } from '@/lib/db';
import {
  addCategory,
  addLocation,
  deleteCategory,
  deleteLocation,
  listActiveCategories,
  listLocations,
} from './config';

const query = vi.fn();
const db: Queryable = { query };
const actor = { userId: 7, ipAddress: '10.0.0.1' };

beforeEach(() => {
  query.mockReset();
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

describe('listLocations', () => {
  it('maps rows including inactive ones', async () => {
    const createdAt = new Date(2024, 0, 1);
    query.mockResolvedValueOnce([{ id: 1, name: 'Keller', is_active: 0, created_at: createdAt }]);

    await expect(listLocations(db)).resolves.toEqual([
      { id: 1, name: 'Keller', isActive: false, createdAt },
    ]);
  });
});

describe('listActiveCategories', () => {
  it('returns a key to display name map', async () => {
    query.mockResolvedValueOnce([
      { key_name: 'electronics', display_name: 'Elektronik' },
      { key_name: 'furniture', display_name: 'Möbel' },
    ]);

    await expect(listActiveCategories(db)).resolves.toEqual({
      electronics: 'Elektronik',
      furniture: 'Möbel',
    });
  });
});

describe('addLocation', () => {
  it('trims, inserts and records the change', async () => {
    query
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 5 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 90 });

    const result = await addLocation(db, '  Lager A ', actor);

    expect(result).toEqual({
      success: true,
      message: 'Standort erfolgreich hinzugefügt',
      data: { id: 5, name: 'Lager A' },
    });
    expect(query.mock.calls[0]).toEqual([
      'SELECT id FROM inventory_locations WHERE LOWER(name) = LOWER(?)',
      ['Lager A'],
    ]);
    expect(query.mock.calls[1]).toEqual(['INSERT INTO inventory_locations (name) VALUES (?)', ['Lager A']]);
    expect(query.mock.calls[2][1]).toEqual([
      7,
      'create',
      'inventory_location',
      5,
      '{"name":"Lager A"}',
      '10.0.0.1',
    ]);
  });

  it('rejects a blank name without touching the database', async () => {
    await expect(addLocation(db, '   ', actor)).resolves.toEqual({
      success: false,
      reason: 'invalid',
      message: 'Standort-Name ist erforderlich',
    });
    expect(query).not.toHaveBeenCalled();
  });

  it('rejects a name that exists in another case', async () => {
    query.mockResolvedValueOnce([{ id: 1 }]);

    const result = await addLocation(db, 'lager a', actor);
    expect(result).toEqual({
      success: false,
      reason: 'duplicate',
      message: 'Standort existiert bereits oder konnte nicht hinzugefügt werden',
    });
    expect(query).toHaveBeenCalledTimes(1);
  });

  it('treats a unique-key violation as a duplicate', async () => {
    query
      .mockResolvedValueOnce([])
      .mockRejectedValueOnce(Object.assign(new Error('Duplicate entry'), { code: 'ER_DUP_ENTRY' }));

    const result = await addLocation(db, 'Lager A', actor);
    expect(result.success).toBe(false);
    expect(result.success ? null : result.reason).toBe('duplicate');
  });

  it('propagates other database errors', async () => {
    const failure = Object.assign(new Error('connection lost'), { code: 'ECONNRESET' });
    query.mockResolvedValueOnce([]).mockRejectedValueOnce(failure);

    await expect(addLocation(db, 'Lager A', actor)).rejects.toBe(failure);
  });
});

describe('deleteLocation', () => {
  it('deletes an unused location', async () => {
    query
      .mockResolvedValueOnce([{ name: 'Keller' }])
      .mockResolvedValueOnce([{ total: 0 }])
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 0 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 91 });

    await expect(deleteLocation(db, 3, actor)).resolves.toEqual({
      success: true,
      message: 'Standort erfolgreich gelöscht',
      data: { id: 3 },
    });
    expect(query.mock.calls[1]).toEqual(['SELECT COUNT(*) AS total FROM inventory WHERE location_id = ?', [3]]);
    expect(query.mock.calls[2]).toEqual(['DELETE FROM inventory_locations WHERE id = ?', [3]]);
    expect(query.mock.calls[3][1]).toEqual([7, 'delete', 'inventory_location', 3, '{"name":"Keller"}', '10.0.0.1']);
  });

  it('refuses while items are stored there', async () => {
    query.mockResolvedValueOnce([{ name: 'Keller' }]).mockResolvedValueOnce([{ total: 2 }]);

    await expect(deleteLocation(db, 3, actor)).resolves.toEqual({
      success: false,
      reason: 'in_use',
      message: 'Standort kann nicht gelöscht werden, da noch 2 Gegenstand/Gegenstände dort gelagert sind',
    });
    expect(query).toHaveBeenCalledTimes(2);
  });

  it('reports an unknown id', async () => {
    query.mockResolvedValueOnce([]);

    await expect(deleteLocation(db, 404, actor)).resolves.toEqual({
      success: false,
      reason: 'not_found',
      message: 'Standort nicht gefunden',
    });
  });
});

describe('addCategory', () => {
  it('inserts a valid category', async () => {
    query
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 8 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 92 });

    await expect(addCategory(db, 'office_supplies', ' Bürobedarf ', actor)).resolves.toEqual({
      success: true,
      message: 'Kategorie erfolgreich hinzugefügt',
      data: { id: 8, keyName: 'office_supplies', displayName: 'Bürobedarf' },
    });
    expect(query.mock.calls[1]).toEqual([
      'INSERT INTO inventory_categories (key_name, display_name) VALUES (?, ?)',
      ['office_supplies', 'Bürobedarf'],
    ]);
  });

  it('requires both names', async () => {
    await expect(addCategory(db, 'tools', '  ', actor)).resolves.toEqual({
      success: false,
      reason: 'invalid',
      message: 'Schlüsselname und Anzeigename sind erforderlich',
    });
  });

  it.each(['Office', 'office-supplies', 'tools2', 'büro'])('rejects the key %s', async (key) => {
    await expect(addCategory(db, key, 'Anzeige', actor)).resolves.toEqual({
      success: false,
      reason: 'invalid',
      message: 'Schlüsselname darf nur Kleinbuchstaben und Unterstriche enthalten',
    });
    expect(query).not.toHaveBeenCalled();
  });

  it('rejects an existing key', async () => {
    query.mockResolvedValueOnce([{ id: 2 }]);

    await expect(addCategory(db, 'tools', 'Werkzeug', actor)).resolves.toEqual({
      success: false,
      reason: 'duplicate',
      message: 'Kategorie existiert bereits oder konnte nicht hinzugefügt werden',
    });
  });
});

describe('deleteCategory', () => {
  it('refuses while items use it', async () => {
    query
      .mockResolvedValueOnce([{ key_name: 'tools', display_name: 'Werkzeug' }])
      .mockResolvedValueOnce([{ total: BigInt(1) }]);

    await expect(deleteCategory(db, 2, actor)).resolves.toEqual({
      success: false,
      reason: 'in_use',
      message:
        'Kategorie kann nicht gelöscht werden, da noch 1 Gegenstand/Gegenstände dieser Kategorie zugeordnet sind',
    });
  });

  it('reports a row that vanished before the delete', async () => {
    query
      .mockResolvedValueOnce([{ key_name: 'tools', display_name: 'Werkzeug' }])
      .mockResolvedValueOnce([{ total: 0 }])
      .mockResolvedValueOnce({ affectedRows: 0, insertId: 0 });

    await expect(deleteCategory(db, 2, actor)).resolves.toEqual({
      success: false,
      reason: 'not_found',
      message: 'Kategorie nicht gefunden',
    });
    expect(query).toHaveBeenCalledTimes(3);
  });

  it('deletes and records the change', async () => {
    query
      .mockResolvedValueOnce([{ key_name: 'tools', display_name: 'Werkzeug' }])
      .mockResolvedValueOnce([{ total: 0 }])
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 0 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 93 });

    const result = await deleteCategory(db, 2, actor);
    expect(result.success).toBe(true);
    expect(query.mock.calls[3][1]).toEqual([
      7,
      'delete',
      'inventory_category',
      2,
      '{"keyName":"tools","displayName":"Werkzeug"}',
      '10.0.0.1',
    ]);
  });
});
