export interface ConnectionInfo {
  userId: string;
  subscribedProjects: Set<string>;
  lastSeen: number;
}

/**
 * Per-connection subscription state plus a project index, so fan-out touches
 * only the subscribers of one project. Membership is not checked here.
 */
export class SubscriptionStore {
  private readonly connections = new Map<string, ConnectionInfo>();
  private readonly subscribers = new Map<string, Set<string>>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Starts a fresh entry for the user and returns the projects a replaced entry held. */
  open(userId: string): string[] {
    const previous = this.close(userId);
    this.connections.set(userId, {
      userId,
      subscribedProjects: new Set(),
      lastSeen: this.now(),
    });
    return previous;
  }

  close(userId: string): string[] {
    const info = this.connections.get(userId);
    if (!info) return [];

    this.connections.delete(userId);
    const projects = [...info.subscribedProjects];
    for (const projectId of projects) {
      this.removeFromIndex(projectId, userId);
    }
    return projects;
  }

  /** Returns true only when the project was newly added. */
  subscribe(userId: string, projectId: string): boolean {
    const info = this.connections.get(userId);
    if (!info) return false;

    info.lastSeen = this.now();
    if (info.subscribedProjects.has(projectId)) return false;

    info.subscribedProjects.add(projectId);
    let users = this.subscribers.get(projectId);
    if (!users) {
      users = new Set();
      this.subscribers.set(projectId, users);
    }
    users.add(userId);
    return true;
  }

  /** Returns true only when the project was actually removed. */
  unsubscribe(userId: string, projectId: string): boolean {
    const info = this.connections.get(userId);
    if (!info || !info.subscribedProjects.delete(projectId)) return false;

    this.removeFromIndex(projectId, userId);
    return true;
  }

  isSubscribed(userId: string, projectId: string): boolean {
    return this.connections.get(userId)?.subscribedProjects.has(projectId) ?? false;
  }

  subscribedProjectsOf(userId: string): string[] {
    const info = this.connections.get(userId);
    return info ? [...info.subscribedProjects] : [];
  }

  subscribersOf(projectId: string): string[] {
    const users = this.subscribers.get(projectId);
    return users ? [...users] : [];
  }

  touch(userId: string): void {
    const info = this.connections.get(userId);
    if (info) info.lastSeen = this.now();
  }

  lastSeenOf(userId: string): number | undefined {
    return this.connections.get(userId)?.lastSeen;
  }

  has(userId: string): boolean {
    return this.connections.has(userId);
  }

  get size(): number {
    return this.connections.size;
  }

  private removeFromIndex(projectId: string, userId: string): void {
    const users = this.subscribers.get(projectId);
    if (!users) return;
    users.delete(userId);
    if (users.size === 0) this.subscribers.delete(projectId);
  }
}
