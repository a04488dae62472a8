import { Capability, Role } from '@/lib/constants/enums';

const ROLE_VALUES: readonly string[] = Object.values(Role);

function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLE_VALUES.includes(value);
}

/** Normalizes a stored or token-carried role; anything unrecognized is `none`. */
export function parseRole(value: unknown): Role {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value;
  return isRole(normalized) ? normalized : Role.NONE;
}

export const FULL_ACCESS_ROLES: readonly Role[] = [
  Role.ADMIN,
  Role.FIRST_CHAIR,
  Role.SECOND_CHAIR,
  Role.THIRD_CHAIR,
  Role.BOARD,
  Role.ALUMNI_BOARD,
];

const ROLE_HIERARCHY: Record<Role, number> = {
  [Role.NONE]: 0,
  [Role.MEMBER]: 1,
  [Role.ALUMNI]: 2,
  [Role.DEPARTMENT_LEAD]: 3,
  [Role.BOARD]: 4,
  [Role.ALUMNI_BOARD]: 4,
  [Role.FIRST_CHAIR]: 4,
  [Role.SECOND_CHAIR]: 4,
  [Role.THIRD_CHAIR]: 4,
  [Role.ADMIN]: 5,
};

const ROLE_CAPABILITIES: Partial<Record<Role, readonly Capability[]>> = {
  [Role.DEPARTMENT_LEAD]: [
    Capability.EDIT_NEWS,
    Capability.EDIT_PROJECTS,
    Capability.EDIT_EVENTS,
    Capability.APPLY_PROJECTS,
    Capability.EDIT_OWN_PROFILE,
    Capability.EDIT_INVENTORY,
  ],
  [Role.ALUMNI]: [Capability.EDIT_OWN_PROFILE, Capability.EDIT_INVENTORY],
  [Role.MEMBER]: [Capability.EDIT_OWN_PROFILE, Capability.APPLY_PROJECTS],
};

export function hasFullAccess(role: Role | null | undefined): boolean {
  return role != null && FULL_ACCESS_ROLES.includes(role);
}

export function can(role: Role | null | undefined, capability: Capability): boolean {
  if (!role || role === Role.NONE) return false;
  if (hasFullAccess(role)) return true;
  if (capability === Capability.VIEW_INVENTORY) return true;
  return ROLE_CAPABILITIES[role]?.includes(capability) ?? false;
}

export function hasRoleAtLeast(role: Role | null | undefined, required: Role): boolean {
  return ROLE_HIERARCHY[role ?? Role.NONE] >= ROLE_HIERARCHY[required];
}

const ROUTE_CAPABILITIES: { prefix: string; capability: Capability }[] = [
  { prefix: '/backoffice/inventory/audit', capability: Capability.VIEW_INVENTORY_AUDIT },
  { prefix: '/backoffice/inventory/config', capability: Capability.MANAGE_INVENTORY_CONFIG },
  { prefix: '/backoffice/alumni-validation', capability: Capability.VALIDATE_ALUMNI },
];

/** Capability a back-office route needs, or null when any signed-in user may open it. */
export function requiredCapabilityFor(pathname: string): Capability | null {
  const match = ROUTE_CAPABILITIES.find(
    ({ prefix }) => pathname === prefix || pathname.startsWith(`${prefix}/`)
  );
  return match?.capability ?? null;
}
