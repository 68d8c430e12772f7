/**
 * Role values carried in the `role` claim of access tokens
 */
export enum UserRole {
  ADMIN = 'admin',
  USER = 'user',
}

export const ADMIN_ROLES = [UserRole.ADMIN];
