export type CredentialKind = 'access' | 'refresh';

/**
 * Fields every record in a revocation store carries. Timestamps are Unix ms.
 */
export interface CredentialRecord {
  kind: CredentialKind;
  tenantId: string;
  credentialId: string;
  userId: string;
  issuedAt: number;
  expiresAt: number;
  revoked: boolean;
  revokedBy?: string;
  revokedAt?: number;
  lastUsedAt?: number;
}

export interface AccessCredentialMetadata extends CredentialRecord {
  kind: 'access';
}

export interface RefreshCredentialMetadata extends CredentialRecord {
  kind: 'refresh';
  // Access credential issued in the same pair
  accessCredentialId?: string;
  // Previous link of the rotation chain
  rotatedFrom?: string;
}

// Claims carried by a signed access credential (seconds since epoch)
export interface CredentialClaims {
  sub: string;
  tenantId: string;
  exp: number;
  iat: number;
  jti: string;
}

export interface TokenPair {
  tenantId: string;
  userId: string;
  accessToken: string;
  accessTokenExpiresAt: number;
  refreshToken: string;
  refreshTokenExpiresAt: number;
}

export interface RevocationCounts {
  access: number;
  refresh: number;
  // Kinds whose bulk revocation did not complete; a retry picks them up
  failed?: CredentialKind[];
}

export type EntityStatus = 'active' | 'inactive';

export interface Role {
  tenantId: string;
  roleId: string;
  name: string;
  permissionIds: string[];
  isTenantAdmin: boolean;
  status: EntityStatus;
}

export interface Permission {
  tenantId: string;
  permissionId: string;
  resource: string;
  action: string;
  isDangerous: boolean;
  status: EntityStatus;
  displayName?: string;
}

export interface UserRoleAssignment {
  tenantId: string;
  userId: string;
  roleId: string;
  assignedAt: number;
  assignedBy: string;
}

export type UserStatus = 'active' | 'inactive' | 'suspended' | 'invited';

// Direct grants attached to a user, bypassing roles
export interface UserGrants {
  tenantId: string;
  userId: string;
  status: UserStatus;
  additionalPermissionIds: string[];
  revokedPermissionIds: string[];
}

export interface EffectivePermissionSet {
  tenantId: string;
  userId: string;
  isTenantAdmin: boolean;
  // Keyed by permission identity ("resource:action")
  permissions: Map<string, Permission>;
}

// Shape attached to an authenticated request
export interface AuthContext {
  tenantId: string;
  userId: string;
  credentialId: string;
  expiresAt: number;
}
