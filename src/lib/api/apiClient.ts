import {
  ApiError,
  ApiTimeoutError,
  AuthRequiredError,
  NetworkError,
} from "../errors.js";
import { isRecord } from "../utils/json.js";
import {
  decodeCombination,
  decodeGameInfo,
  decodeGameResult,
  decodeLogin,
  decodePlaycard,
  decodeRegister,
  type CombinationGrant,
  type GameInfo,
  type GameResultPayload,
  type LoginResponse,
  type PlaycardResponse,
  type RegisterResponse,
} from "./schemas.js";

export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

export interface ApiClientOptions {
  baseUrl: string;
  timeoutMs: number;
  resultTimeoutMs: number;
  // Current bearer token, or null when signed out
  getAuthToken: () => string | null;
  fetch?: FetchLike;
}

export interface RegistrationInput {
  username: string;
  password: string;
  email: string;
  firstName: string;
  lastName: string;
}

export interface CombinationRequest {
  gameName: string;
  drawDate: string;
  combinationNumber: number;
}

export interface PlaycardSubmission {
  userId: number;
  gameName: string;
  drawDate: string;
  playCardId: number;
  ingotIds: number[];
}

export interface DeviceRegistration {
  userId: number;
  fcmToken: string;
  deviceType: string;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  auth?: boolean;
  timeoutMs?: number;
}

/**
 * HTTP client for the Golden Ticket backend
 */
export class GoldenTicketApi {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ApiClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async login(username: string, password: string): Promise<LoginResponse> {
    const body = await this.request("POST", "/login", {
      body: { username, password },
      auth: false,
    });
    return decodeLogin(body);
  }

  async register(input: RegistrationInput): Promise<RegisterResponse> {
    const body = await this.request("POST", "/register", {
      body: {
        username: input.username,
        password: input.password,
        email: input.email,
        first_name: input.firstName,
        last_name: input.lastName,
      },
      auth: false,
    });
    return decodeRegister(body);
  }

  /**
   * Returns null when the server answers with an empty body
   */
  async getGameInfo(gameName: string): Promise<GameInfo | null> {
    const body = await this.request("GET", "/game-info", {
      query: { game_name: gameName },
    });
    return body === null ? null : decodeGameInfo(body);
  }

  async getGameResult(
    gameName: string,
    drawDate: string,
  ): Promise<GameResultPayload | null> {
    const body = await this.request("GET", "/game-result", {
      query: { game_name: gameName, draw_date: drawDate },
      timeoutMs: this.options.resultTimeoutMs,
    });
    return body === null ? null : decodeGameResult(body);
  }

  async requestCombination(
    request: CombinationRequest,
  ): Promise<CombinationGrant> {
    const body = await this.request("POST", "/request-combination", {
      body: {
        game_name: request.gameName,
        draw_date: request.drawDate,
        combination_number: request.combinationNumber,
      },
    });
    return decodeCombination(body);
  }

  async submitPlaycard(
    submission: PlaycardSubmission,
  ): Promise<PlaycardResponse> {
    const body = await this.request("POST", "/submit-playcard", {
      body: {
        user_id: submission.userId,
        game_name: submission.gameName,
        draw_date: submission.drawDate,
        play_card_id: submission.playCardId,
        ingot_ids: submission.ingotIds,
      },
    });
    return decodePlaycard(body);
  }

  async registerDevice(registration: DeviceRegistration): Promise<void> {
    await this.request("POST", "/device/register", {
      body: {
        user_id: registration.userId,
        fcm_token: registration.fcmToken,
        device_type: registration.deviceType,
      },
    });
  }

  /**
   * Perform a request and return the parsed JSON body (null when empty).
   * Non-2xx answers raise ApiError with the server's message when present.
   */
  private async request(
    method: "GET" | "POST",
    path: string,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const url = new URL(`${this.options.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (options.auth !== false) {
      const token = this.options.getAuthToken();
      if (!token) {
        throw new AuthRequiredError(`call ${path}`);
      }
      headers.Authorization = `Bearer ${token}`;
    }

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    let status: number;
    let ok: boolean;
    let text: string;

    try {
      const response = await this.fetchImpl(url.toString(), {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        console.warn(`⚠️ ${method} ${path} timed out after ${timeoutMs}ms`);
        throw new ApiTimeoutError(path, timeoutMs);
      }
      console.warn(`⚠️ ${method} ${path} failed:`, error);
      throw new NetworkError(path, error);
    }

    const body = parseBody(text);

    if (!ok) {
      const message =
        isRecord(body) && typeof body.message === "string"
          ? body.message
          : text || `HTTP ${status}`;
      throw new ApiError(path, status, message);
    }

    return body;
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // Left for the decoder to reject
    return text;
  }
}
