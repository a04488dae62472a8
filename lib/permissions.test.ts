import { describe, expect, it } from 'vitest';
import { Capability, Role } from '@/lib/constants/enums';
import { can, hasFullAccess, hasRoleAtLeast, parseRole, requiredCapabilityFor } from './permissions';

describe('parseRole', () => {
  it('normalizes case and whitespace', () => {
    expect(parseRole(' Admin ')).toBe(Role.ADMIN);
    expect(parseRole('1V')).toBe(Role.FIRST_CHAIR);
  });

  it('maps unknown and non-string values to none', () => {
    expect(parseRole('superuser')).toBe(Role.NONE);
    expect(parseRole(undefined)).toBe(Role.NONE);
    expect(parseRole(42)).toBe(Role.NONE);
  });
});

describe('hasFullAccess', () => {
  it.each([Role.ADMIN, Role.FIRST_CHAIR, Role.SECOND_CHAIR, Role.THIRD_CHAIR, Role.BOARD, Role.ALUMNI_BOARD])(
    'grants %s full access',
    (role) => {
      expect(hasFullAccess(role)).toBe(true);
    }
  );

  it.each([Role.DEPARTMENT_LEAD, Role.ALUMNI, Role.MEMBER, Role.NONE])('denies %s', (role) => {
    expect(hasFullAccess(role)).toBe(false);
  });

  it('denies a missing role', () => {
    expect(hasFullAccess(null)).toBe(false);
  });
});

describe('can', () => {
  it('gives full-access roles every capability', () => {
    for (const capability of Object.values(Capability)) {
      expect(can(Role.BOARD, capability)).toBe(true);
    }
  });

  it('limits administrative pages to full-access roles', () => {
    expect(can(Role.DEPARTMENT_LEAD, Capability.VIEW_INVENTORY_AUDIT)).toBe(false);
    expect(can(Role.DEPARTMENT_LEAD, Capability.MANAGE_INVENTORY_CONFIG)).toBe(false);
    expect(can(Role.ALUMNI, Capability.VALIDATE_ALUMNI)).toBe(false);
  });

  it('follows the per-role capability lists', () => {
    expect(can(Role.DEPARTMENT_LEAD, Capability.EDIT_NEWS)).toBe(true);
    expect(can(Role.ALUMNI, Capability.EDIT_INVENTORY)).toBe(true);
    expect(can(Role.ALUMNI, Capability.APPLY_PROJECTS)).toBe(false);
    expect(can(Role.MEMBER, Capability.APPLY_PROJECTS)).toBe(true);
    expect(can(Role.MEMBER, Capability.EDIT_INVENTORY)).toBe(false);
  });

  it('lets every signed-in role view the inventory', () => {
    expect(can(Role.MEMBER, Capability.VIEW_INVENTORY)).toBe(true);
    expect(can(Role.NONE, Capability.VIEW_INVENTORY)).toBe(false);
    expect(can(undefined, Capability.VIEW_INVENTORY)).toBe(false);
  });
});

describe('hasRoleAtLeast', () => {
  it('compares along the hierarchy', () => {
    expect(hasRoleAtLeast(Role.ADMIN, Role.BOARD)).toBe(true);
    expect(hasRoleAtLeast(Role.SECOND_CHAIR, Role.BOARD)).toBe(true);
    expect(hasRoleAtLeast(Role.DEPARTMENT_LEAD, Role.ALUMNI)).toBe(true);
    expect(hasRoleAtLeast(Role.MEMBER, Role.ALUMNI)).toBe(false);
    expect(hasRoleAtLeast(null, Role.MEMBER)).toBe(false);
  });
});

describe('requiredCapabilityFor', () => {
  it('maps gated routes and their sub-paths', () => {
    expect(requiredCapabilityFor('/backoffice/inventory/audit')).toBe(Capability.VIEW_INVENTORY_AUDIT);
    expect(requiredCapabilityFor('/backoffice/inventory/config/extra')).toBe(
      Capability.MANAGE_INVENTORY_CONFIG
    );
    expect(requiredCapabilityFor('/backoffice/alumni-validation')).toBe(Capability.VALIDATE_ALUMNI);
  });

  it('does not match on a shared prefix alone', () => {
    expect(requiredCapabilityFor('/backoffice/inventory/auditing')).toBeNull();
    expect(requiredCapabilityFor('/backoffice/inventory')).toBeNull();
    expect(requiredCapabilityFor('/backoffice')).toBeNull();
  });
});
