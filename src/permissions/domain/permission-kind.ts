/**
 * Queue-group permission kinds. `rw` implies every other kind.
 */
export enum PermissionKind {
  RW = 'rw',
  RO = 'ro',
  NOTE = 'note',
  CREATE = 'create',
  MOVE_INTO = 'move_into',
  OWNER = 'owner',
  PRIORITY = 'priority',
}

export const ALL_PERMISSION_KINDS: readonly PermissionKind[] = [
  PermissionKind.RW,
  PermissionKind.RO,
  PermissionKind.NOTE,
  PermissionKind.CREATE,
  PermissionKind.MOVE_INTO,
  PermissionKind.OWNER,
  PermissionKind.PRIORITY,
];

export function parsePermissionKind(value: string): PermissionKind | null {
  const normalized = value.trim().toLowerCase();
  return (
    ALL_PERMISSION_KINDS.find((kind) => kind === normalized) ?? null
  );
}

/**
 * Effective kinds for a set of stored grants. Unknown keys are ignored;
 * `rw` expands to every kind.
 */
export function effectivePermissions(
  grantedKeys: readonly string[],
): Set<PermissionKind> {
  const kinds = new Set<PermissionKind>();
  for (const key of grantedKeys) {
    const kind = parsePermissionKind(key);
    if (kind) {
      kinds.add(kind);
    }
  }
  if (kinds.has(PermissionKind.RW)) {
    return new Set(ALL_PERMISSION_KINDS);
  }
  return kinds;
}
