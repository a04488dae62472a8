import { logAudit } from '@/lib/audit/repository';
import { AuditAction, AuditTargetType } from '@/lib/constants/enums';
import type { Queryable, WriteResult } from '@/lib/db';

export interface InventoryLocation {
  id: number;
  name: string;
  isActive: boolean;
  createdAt: Date;
}

export interface InventoryCategory {
  id: number;
  keyName: string;
  displayName: string;
  isActive: boolean;
  createdAt: Date;
}

/** Who performed a configuration change; recorded in system_logs. */
export interface Actor {
  userId: number;
  ipAddress?: string | null;
}

export type ConfigFailureReason = 'invalid' | 'duplicate' | 'not_found' | 'in_use';

export type MutationResult<T> =
  | { success: true; message: string; data: T }
  | { success: false; reason: ConfigFailureReason; message: string };

export const CATEGORY_KEY_PATTERN = /^[a-z_]+$/;

interface LocationRow {
  id: number;
  name: string;
  is_active: number | boolean;
  created_at: Date;
}

interface CategoryRow {
  id: number;
  key_name: string;
  display_name: string;
  is_active: number | boolean;
  created_at: Date;
}

interface CountRow {
  total: number | bigint;
}

function fail<T>(reason: ConfigFailureReason, message: string): MutationResult<T> {
  return { success: false, reason, message };
}

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ER_DUP_ENTRY';
}

async function countInventoryItems(
  db: Queryable,
  column: 'location_id' | 'category_id',
  id: number
): Promise<number> {
  const rows = await db.query<CountRow[]>(
    `SELECT COUNT(*) AS total FROM inventory WHERE ${column} = ?`,
    [id]
  );
  return rows.length > 0 ? Number(rows[0].total) : 0;
}

// --- Locations ---------------------------------------------------------

/** All locations including inactive ones, by name. */
export async function listLocations(db: Queryable): Promise<InventoryLocation[]> {
  const rows = await db.query<LocationRow[]>(
    'SELECT id, name, is_active, created_at FROM inventory_locations ORDER BY name ASC'
  );
  return rows.map((row) => ({
    id: row.id,
    name: row.name,
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
  }));
}

export async function listActiveLocationNames(db: Queryable): Promise<string[]> {
  const rows = await db.query<Pick<LocationRow, 'name'>[]>(
    'SELECT name FROM inventory_locations WHERE is_active = 1 ORDER BY name ASC'
  );
  return rows.map((row) => row.name);
}

export async function addLocation(
  db: Queryable,
  rawName: string,
  actor: Actor
): Promise<MutationResult<{ id: number; name: string }>> {
  const name = rawName.trim();
  if (!name) {
    return fail('invalid', 'Standort-Name ist erforderlich');
  }

  const existing = await db.query<{ id: number }[]>(
    'SELECT id FROM inventory_locations WHERE LOWER(name) = LOWER(?)',
    [name]
  );
  if (existing.length > 0) {
    return fail('duplicate', 'Standort existiert bereits oder konnte nicht hinzugefügt werden');
  }

  let result: WriteResult;
  try {
    result = await db.query<WriteResult>('INSERT INTO inventory_locations (name) VALUES (?)', [name]);
  } catch (error) {
    // Lost a race against a concurrent insert of the same name.
    if (isDuplicateKeyError(error)) {
      return fail('duplicate', 'Standort existiert bereits oder konnte nicht hinzugefügt werden');
    }
    throw error;
  }

  const id = Number(result.insertId);
  await logAudit(db, {
    userId: actor.userId,
    action: AuditAction.CREATE,
    targetType: AuditTargetType.INVENTORY_LOCATION,
    targetId: id,
    details: { name },
    ipAddress: actor.ipAddress,
  });
  console.info(`Inventory location added: ${name} (#${id})`);

  return { success: true, message: 'Standort erfolgreich hinzugefügt', data: { id, name } };
}

export async function deleteLocation(
  db: Queryable,
  id: number,
  actor: Actor
): Promise<MutationResult<{ id: number }>> {
  const rows = await db.query<Pick<LocationRow, 'name'>[]>(
    'SELECT name FROM inventory_locations WHERE id = ?',
    [id]
  );
  if (rows.length === 0) {
    return fail('not_found', 'Standort nicht gefunden');
  }
  const { name } = rows[0];

  const inUse = await countInventoryItems(db, 'location_id', id);
  if (inUse > 0) {
    return fail(
      'in_use',
      `Standort kann nicht gelöscht werden, da noch ${inUse} Gegenstand/Gegenstände dort gelagert sind`
    );
  }

  const result = await db.query<WriteResult>('DELETE FROM inventory_locations WHERE id = ?', [id]);
  if (result.affectedRows === 0) {
    return fail('not_found', 'Standort nicht gefunden');
  }

  await logAudit(db, {
    userId: actor.userId,
    action: AuditAction.DELETE,
    targetType: AuditTargetType.INVENTORY_LOCATION,
    targetId: id,
    details: { name },
    ipAddress: actor.ipAddress,
  });
  console.info(`Inventory location deleted: ${name} (#${id})`);

  return { success: true, message: 'Standort erfolgreich gelöscht', data: { id } };
}

// --- Categories --------------------------------------------------------

/** All categories including inactive ones, by display name. */
export async function listCategories(db: Queryable): Promise<InventoryCategory[]> {
  const rows = await db.query<CategoryRow[]>(
    `SELECT id, key_name, display_name, is_active, created_at
     FROM inventory_categories ORDER BY display_name ASC`
  );
  return rows.map((row) => ({
    id: row.id,
    keyName: row.key_name,
    displayName: row.display_name,
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
  }));
}

/** Active categories as key → display name. */
export async function listActiveCategories(db: Queryable): Promise<Record<string, string>> {
  const rows = await db.query<Pick<CategoryRow, 'key_name' | 'display_name'>[]>(
    'SELECT key_name, display_name FROM inventory_categories WHERE is_active = 1 ORDER BY display_name ASC'
  );
  return Object.fromEntries(rows.map((row) => [row.key_name, row.display_name]));
}

export async function addCategory(
  db: Queryable,
  rawKeyName: string,
  rawDisplayName: string,
  actor: Actor
): Promise<MutationResult<{ id: number; keyName: string; displayName: string }>> {
  const keyName = rawKeyName.trim();
  const displayName = rawDisplayName.trim();
  if (!keyName || !displayName) {
    return fail('invalid', 'Schlüsselname und Anzeigename sind erforderlich');
  }
  if (!CATEGORY_KEY_PATTERN.test(keyName)) {
    return fail('invalid', 'Schlüsselname darf nur Kleinbuchstaben und Unterstriche enthalten');
  }

  const existing = await db.query<{ id: number }[]>(
    'SELECT id FROM inventory_categories WHERE LOWER(key_name) = LOWER(?)',
    [keyName]
  );
  if (existing.length > 0) {
    return fail('duplicate', 'Kategorie existiert bereits oder konnte nicht hinzugefügt werden');
  }

  let result: WriteResult;
  try {
    result = await db.query<WriteResult>(
      'INSERT INTO inventory_categories (key_name, display_name) VALUES (?, ?)',
      [keyName, displayName]
    );
  } catch (error) {
    if (isDuplicateKeyError(error)) {
      return fail('duplicate', 'Kategorie existiert bereits oder konnte nicht hinzugefügt werden');
    }
    throw error;
  }

  const id = Number(result.insertId);
  await logAudit(db, {
    userId: actor.userId,
    action: AuditAction.CREATE,
    targetType: AuditTargetType.INVENTORY_CATEGORY,
    targetId: id,
    details: { keyName, displayName },
    ipAddress: actor.ipAddress,
  });
  console.info(`Inventory category added: ${keyName} (${displayName}, #${id})`);

  return {
    success: true,
    message: 'Kategorie erfolgreich hinzugefügt',
    data: { id, keyName, displayName },
  };
}

export async function deleteCategory(
  db: Queryable,
  id: number,
  actor: Actor
): Promise<MutationResult<{ id: number }>> {
  const rows = await db.query<Pick<CategoryRow, 'key_name' | 'display_name'>[]>(
    'SELECT key_name, display_name FROM inventory_categories WHERE id = ?',
    [id]
  );
  if (rows.length === 0) {
    return fail('not_found', 'Kategorie nicht gefunden');
  }
  const { key_name: keyName, display_name: displayName } = rows[0];

  const inUse = await countInventoryItems(db, 'category_id', id);
  if (inUse > 0) {
    return fail(
      'in_use',
      `Kategorie kann nicht gelöscht werden, da noch ${inUse} Gegenstand/Gegenstände dieser Kategorie zugeordnet sind`
    );
  }

  const result = await db.query<WriteResult>('DELETE FROM inventory_categories WHERE id = ?', [id]);
  if (result.affectedRows === 0) {
    return fail('not_found', 'Kategorie nicht gefunden');
  }

  await logAudit(db, {
    userId: actor.userId,
    action: AuditAction.DELETE,
    targetType: AuditTargetType.INVENTORY_CATEGORY,
    targetId: id,
    details: { keyName, displayName },
    ipAddress: actor.ipAddress,
  });
  console.info(`Inventory category deleted: ${keyName} (#${id})`);

  return { success: true, message: 'Kategorie erfolgreich gelöscht', data: { id } };
}
