/**
 * Lifecycle status a registry assigns to a published server version.
 */
export const ServerStatus = {
  ACTIVE: 'active',
  DEPRECATED: 'deprecated',
  DELETED: 'deleted',
} as const;

export type ServerStatus = (typeof ServerStatus)[keyof typeof ServerStatus];
