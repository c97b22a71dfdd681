import type { UserId } from "#types";

/**
 * Who is logged in for one front-end session. Passed explicitly to every
 * operation that acts on behalf of a user.
 */
export class Session {
  private current: { userId: UserId; username: string } | null = null;

  login(userId: UserId, username: string): void {
    this.current = { userId, username };
  }

  logout(): void {
    this.current = null;
  }

  get userId(): UserId | null {
    return this.current?.userId ?? null;
  }

  get username(): string | null {
    return this.current?.username ?? null;
  }
}
