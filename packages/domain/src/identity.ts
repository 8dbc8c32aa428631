/** The authenticated user behind a realtime connection. */
export interface Identity {
  userId: string;
  username: string;
  displayName: string;
  avatarUrl: string | null;
}

export interface UserRecord {
  id: string;
  username: string;
  displayName: string;
  avatarUrl: string | null;
  isActive: boolean;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function toIdentity(user: UserRecord): Identity {
  return {
    userId: user.id,
    username: user.username,
    displayName: user.displayName || user.username,
    avatarUrl: user.avatarUrl,
  };
}
