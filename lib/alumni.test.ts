import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Queryable } from '@/lib/db';
import { getPendingAlumniValidations, toPendingAlumniView, validateAlumniStatus } from './alumni';

const query = vi.fn();
const db: Queryable = { query };

beforeEach(() => {
  query.mockReset();
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

describe('getPendingAlumniValidations', () => {
  it('selects unvalidated alumni, oldest request first', async () => {
    const createdAt = new Date(2021, 9, 1);
    query.mockResolvedValueOnce([
      {
        id: 9,
        firstname: 'Max',
        lastname: 'Beispiel',
        email: 'max@example.com',
        alumni_status_requested_at: null,
        created_at: createdAt,
      },
    ]);

    await expect(getPendingAlumniValidations(db)).resolves.toEqual([
      {
        id: 9,
        firstname: 'Max',
        lastname: 'Beispiel',
        email: 'max@example.com',
        requestedAt: null,
        createdAt,
      },
    ]);
    const [sql, values] = query.mock.calls[0];
    expect(String(sql)).toContain('WHERE role = ? AND is_alumni_validated = 0');
    expect(String(sql)).toContain(
      'ORDER BY alumni_status_requested_at IS NULL, alumni_status_requested_at ASC, id ASC'
    );
    expect(values).toEqual(['alumni']);
  });
});

describe('validateAlumniStatus', () => {
  const board = { userId: 1, role: 'vorstand' as const, ipAddress: '10.0.0.1' };

  it('validates a pending alumni and records it', async () => {
    query
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 0 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 0 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 77 });

    await expect(validateAlumniStatus(db, 9, board)).resolves.toBe(true);
    expect(query.mock.calls[0]).toEqual([
      'UPDATE users SET is_alumni_validated = 1 WHERE id = ? AND role = ? AND is_alumni_validated = 0',
      [9, 'alumni'],
    ]);
    expect(query.mock.calls[1]).toEqual([
      'UPDATE alumni_profiles SET is_alumni_validated = 1 WHERE user_id = ?',
      [9],
    ]);
    expect(query.mock.calls[2][1]).toEqual([1, 'validate', 'alumni', 9, null, '10.0.0.1']);
  });

  it('does nothing for validators without full access', async () => {
    await expect(
      validateAlumniStatus(db, 9, { userId: 2, role: 'ressortleiter' })
    ).resolves.toBe(false);
    expect(query).not.toHaveBeenCalled();
  });

  it('fails for users that are not pending alumni', async () => {
    query.mockResolvedValueOnce({ affectedRows: 0, insertId: 0 });

    await expect(validateAlumniStatus(db, 3, board)).resolves.toBe(false);
    expect(query).toHaveBeenCalledTimes(1);
  });

  it('is not repeatable', async () => {
    query
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 0 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 0 })
      .mockResolvedValueOnce({ affectedRows: 1, insertId: 78 })
      .mockResolvedValueOnce({ affectedRows: 0, insertId: 0 });

    await expect(validateAlumniStatus(db, 9, board)).resolves.toBe(true);
    await expect(validateAlumniStatus(db, 9, board)).resolves.toBe(false);
  });
});

describe('toPendingAlumniView', () => {
  it('formats dates for display', () => {
    expect(
      toPendingAlumniView([
        {
          id: 9,
          firstname: 'Max',
          lastname: 'Beispiel',
          email: 'max@example.com',
          requestedAt: new Date(2024, 4, 17, 8, 5),
          createdAt: new Date(2021, 9, 1),
        },
        {
          id: 10,
          firstname: 'Lena',
          lastname: 'Probe',
          email: 'lena@example.com',
          requestedAt: null,
          createdAt: new Date(2019, 0, 31),
        },
      ])
    ).toEqual([
      {
        id: 9,
        name: 'Max Beispiel',
        email: 'max@example.com',
        requestedAt: '17.05.2024 08:05',
        memberSince: '01.10.2021',
      },
      {
        id: 10,
        name: 'Lena Probe',
        email: 'lena@example.com',
        requestedAt: 'Nicht verfügbar',
        memberSince: '31.01.2019',
      },
    ]);
  });
});
