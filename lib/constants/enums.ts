/**
 * Client-safe enum constants. Mirror the ENUM and VARCHAR values stored in
 * the database so client components never import server modules.
 */

export const Role = {
  ADMIN: 'admin',
  FIRST_CHAIR: '1v',
  SECOND_CHAIR: '2v',
  THIRD_CHAIR: '3v',
  BOARD: 'vorstand',
  ALUMNI_BOARD: 'alumni-vorstand',
  DEPARTMENT_LEAD: 'ressortleiter',
  ALUMNI: 'alumni',
  MEMBER: 'mitglied',
  NONE: 'none',
} as const;
export type Role = (typeof Role)[keyof typeof Role];

export const Capability = {
  VIEW_INVENTORY: 'view_inventory',
  EDIT_INVENTORY: 'edit_inventory',
  MANAGE_INVENTORY_CONFIG: 'manage_inventory_config',
  VIEW_INVENTORY_AUDIT: 'view_inventory_audit',
  VALIDATE_ALUMNI: 'validate_alumni',
  EDIT_NEWS: 'edit_news',
  EDIT_PROJECTS: 'edit_projects',
  EDIT_EVENTS: 'edit_events',
  APPLY_PROJECTS: 'apply_projects',
  EDIT_OWN_PROFILE: 'edit_own_profile',
} as const;
export type Capability = (typeof Capability)[keyof typeof Capability];

export const AuditAction = {
  CREATE: 'create',
  UPDATE: 'update',
  DELETE: 'delete',
  ADJUST_QUANTITY: 'adjust_quantity',
  VALIDATE: 'validate',
} as const;
export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

export const AuditTargetType = {
  INVENTORY: 'inventory',
  INVENTORY_LOCATION: 'inventory_location',
  INVENTORY_CATEGORY: 'inventory_category',
  NEWS: 'news',
  ALUMNI: 'alumni',
} as const;
export type AuditTargetType = (typeof AuditTargetType)[keyof typeof AuditTargetType];
