import { EventTypes, type EventBus } from "../../services/eventBus.js";

export interface SessionUser {
  userId: number;
  authToken: string;
  accountStatus: string | null;
  membershipLevel: string | null;
}

/**
 * Capability the engine needs from authentication
 */
export interface SessionState {
  readonly isSignedIn: boolean;
  readonly userId: number | null;
  readonly authToken: string | null;
}

/**
 * In-memory sign-in state; publishes session events on the bus
 */
export class AuthSession implements SessionState {
  private user: SessionUser | null = null;

  constructor(private readonly bus?: EventBus) {}

  get isSignedIn(): boolean {
    return this.user !== null;
  }

  get userId(): number | null {
    return this.user?.userId ?? null;
  }

  get authToken(): string | null {
    return this.user?.authToken ?? null;
  }

  get membershipLevel(): string | null {
    return this.user?.membershipLevel ?? null;
  }

  signIn(user: SessionUser): void {
    this.user = { ...user };
    this.bus?.publish(
      EventTypes.SESSION_SIGNED_IN,
      { userId: user.userId },
      "session",
    );
  }

  signOut(): void {
    if (!this.user) return;
    const { userId } = this.user;
    this.user = null;
    this.bus?.publish(EventTypes.SESSION_SIGNED_OUT, { userId }, "session");
  }
}
