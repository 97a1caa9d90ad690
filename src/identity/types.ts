/**
 * School SQL Guard - Identity Types
 *
 * Roles are a closed union. Code that branches on a role goes through an
 * exhaustive switch or a Record<Role, ...> so a new role fails to compile
 * until every site handles it.
 */

export const ROLES = ['student', 'teacher'] as const;

export type Role = (typeof ROLES)[number];

export interface Identity {
  readonly userId: string;
  readonly role: Role;
  /** StudentID or TeacherID of the requester, when known */
  readonly roleId?: string;
}

/**
 * Identity fields a condition template may bind to
 */
export const IDENTITY_FIELDS = ['current_user_id', 'current_role_id'] as const;

export type IdentityField = (typeof IDENTITY_FIELDS)[number];

export interface IdentityResolver {
  /**
   * Resolve a login user id to an identity.
   * Rejects with IdentityNotFoundError when the user is neither student nor teacher.
   */
  resolve(userId: string): Promise<Identity>;
}

export function isIdentityField(value: string): value is IdentityField {
  return IDENTITY_FIELDS.some((field) => field === value);
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

/**
 * Value an identity field binds to, undefined when the identity lacks it
 */
export function identityValue(identity: Identity, field: IdentityField): string | undefined {
  switch (field) {
    case 'current_user_id':
      return identity.userId;
    case 'current_role_id':
      return identity.roleId;
    default:
      return assertNever(field);
  }
}

export function createIdentity(userId: string, role: Role, roleId?: string): Identity {
  const identity: Identity = roleId === undefined ? { userId, role } : { userId, role, roleId };
  return Object.freeze(identity);
}
