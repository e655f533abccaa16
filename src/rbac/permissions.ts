import { ValidationError } from '../shared/errors';
import { Permission } from '../shared/types';

export const PERMISSION_WILDCARD = '*:*';

// Stable identity of a permission within a tenant
export function permissionIdentity(permission: Pick<Permission, 'resource' | 'action'>): string {
  return `${permission.resource.toLowerCase()}:${permission.action.toLowerCase()}`;
}

/**
 * Parses "resource:action" (case-insensitive). Anything after a second colon
 * is a scope and is not part of the identity.
 */
export function parsePermissionString(value: string): { resource: string; action: string } {
  const [resource, action] = value.split(':');
  if (!resource || !action) {
    throw new ValidationError(`Invalid permission string: ${value}`, ['permission']);
  }
  return { resource: resource.toLowerCase(), action: action.toLowerCase() };
}

export function normalizePermission(value: string): string {
  return permissionIdentity(parsePermissionString(value));
}

/**
 * True if `granted` contains `required`, directly or through a wildcard
 * ("*:*", "orders:*", "*:read").
 */
export function grants(granted: ReadonlySet<string>, required: string): boolean {
  const { resource, action } = parsePermissionString(required);
  return (
    granted.has(`${resource}:${action}`) ||
    granted.has(`${resource}:*`) ||
    granted.has(`*:${action}`) ||
    granted.has(PERMISSION_WILDCARD)
  );
}
