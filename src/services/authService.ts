import type {
  DeviceRegistration,
  RegistrationInput,
} from "../lib/api/apiClient.js";
import type { LoginResponse, RegisterResponse } from "../lib/api/schemas.js";
import type { AuthSession } from "../lib/auth/session.js";
import { ApiError, AuthRequiredError } from "../lib/errors.js";
import type { ProgressService } from "./progressService.js";

export interface AuthApi {
  login(username: string, password: string): Promise<LoginResponse>;
  register(input: RegistrationInput): Promise<RegisterResponse>;
  registerDevice(registration: DeviceRegistration): Promise<void>;
}

export interface SignInResult {
  userId: number;
  membershipLevel: string | null;
  accountStatus: string | null;
  minimumAppVersion: string | null;
}

/**
 * Sign-in, registration and push-token registration
 */
export class AuthService {
  constructor(
    private readonly api: AuthApi,
    private readonly session: AuthSession,
    private readonly progress?: ProgressService,
  ) {}

  async signIn(username: string, password: string): Promise<SignInResult> {
    const response = await this.api.login(username, password);

    if (response.code !== "success" || !response.data) {
      const message = response.message ?? "Sign in failed.";
      console.warn(`⚠️ Sign in rejected for ${username}: ${message}`);
      throw new ApiError("/login", 200, message);
    }

    const { data } = response;
    if (this.progress) {
      const profile = await this.progress.getProfile(data.userId);
      await this.progress.upsertProfile({
        userId: data.userId,
        membershipLevel: data.membershipLevel,
        globalAwards: profile?.globalAwards ?? [],
        globalStatistics: profile?.globalStatistics ?? {},
      });
    }

    this.session.signIn({
      userId: data.userId,
      authToken: data.authToken,
      accountStatus: data.accountStatus,
      membershipLevel: data.membershipLevel,
    });
    console.log(`✅ Signed in as user ${data.userId}`);

    return {
      userId: data.userId,
      membershipLevel: data.membershipLevel,
      accountStatus: data.accountStatus,
      minimumAppVersion: data.appVersion,
    };
  }

  /**
   * A non-success status is returned, not thrown; the message is for the user
   */
  async register(input: RegistrationInput): Promise<RegisterResponse> {
    const response = await this.api.register(input);
    if (response.status === "success") {
      console.log(`✅ Account created for ${input.username}`);
    } else {
      console.warn(`⚠️ Account creation failed: ${response.message}`);
    }
    return response;
  }

  async registerDevice(fcmToken: string, deviceType: string): Promise<void> {
    const userId = this.session.userId;
    if (userId === null) {
      throw new AuthRequiredError("register device");
    }
    await this.api.registerDevice({ userId, fcmToken, deviceType });
  }

  signOut(): void {
    this.session.signOut();
  }
}
