import { Authorizer } from '../types';

/**
 * Allowlist-backed authorizer. Suitable for moderators/admins configured at
 * startup; swap in a role-service lookup behind the same interface for anything more.
 */
export class StaticAuthorizer implements Authorizer {
  private privileged: Set<string>;

  constructor(subjectIds: Iterable<string> = []) {
    this.privileged = new Set(subjectIds);
  }

  isPrivileged(subjectId: string): boolean {
    return this.privileged.has(subjectId);
  }

  grant(subjectId: string): void {
    this.privileged.add(subjectId);
  }

  revoke(subjectId: string): boolean {
    return this.privileged.delete(subjectId);
  }

  list(): string[] {
    return Array.from(this.privileged);
  }
}
