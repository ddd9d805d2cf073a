import Joi from "joi";
import { DecodeError } from "../errors.js";

/**
 * Response decoders for the remote API
 * The backend encodes numbers loosely (ints, numeric strings, doubles);
 * every field is normalised here so callers only see typed values.
 */

// Integer that may arrive as a string or a double
const looseInt = Joi.number().custom((value: number) => Math.round(value));
const optionalInt = looseInt.allow(null).empty("");
const optionalText = Joi.alternatives()
  .try(Joi.string(), Joi.number().custom((value: number) => String(value)))
  .allow(null);

export interface LoginData {
  userId: number;
  accountStatus: string | null;
  membershipLevel: string | null;
  authToken: string;
  appVersion: string | null;
}

export interface LoginResponse {
  code: string;
  message: string | null;
  data: LoginData | null;
}

export interface RegisterResponse {
  status: string;
  message: string;
  userId: number | null;
  verificationUrl: string | null;
}

export interface GameInfo {
  drawDate: string | null;
  totalCombinations: number | null;
  userRequestLimit: number | null;
  userCombinationsRequested: number | null;
  archiveChecksum: string | null;
}

export interface GameResultPayload {
  winningNumbers: number[];
  bonusNumber: number | null;
  totalCombinations: number | null;
  odds: Record<string, number>;
  userScore: number | null;
  winId: string | null;
  archivePassword: string | null;
  archiveChecksum: string | null;
}

export interface CombinationGrant {
  ingotId: number;
  numbers: number[];
  userRequestsCount: number;
}

export interface PlaycardResponse {
  status: string;
  message: string | null;
}

interface LoginWire {
  code: string;
  message?: string | null;
  data?: {
    user_id: number;
    account_status?: string | null;
    membership_level?: string | null;
    auth_token: string;
    app_version?: string | null;
  } | null;
}

const loginSchema = Joi.object<LoginWire>({
  code: Joi.string().required(),
  message: Joi.string().allow("", null),
  data: Joi.object({
    user_id: looseInt.required(),
    account_status: optionalText,
    membership_level: optionalText,
    auth_token: Joi.string().required(),
    app_version: optionalText,
  })
    .unknown(true)
    .allow(null),
}).unknown(true);

interface RegisterWire {
  status: string;
  message?: string | null;
  data?: {
    user_id?: number | null;
    verification_url?: string | null;
  } | null;
}

const registerSchema = Joi.object<RegisterWire>({
  status: Joi.string().required(),
  message: Joi.string().allow("", null),
  data: Joi.object({
    user_id: optionalInt,
    verification_url: Joi.string().allow("", null),
  })
    .unknown(true)
    .allow(null),
}).unknown(true);

interface GameInfoWire {
  draw_date?: string | null;
  total_combinations?: number | null;
  user_request_limit?: number | null;
  user_combinations_requested?: number | null;
  archive_checksum?: string | null;
}

const gameInfoSchema = Joi.object<GameInfoWire>({
  draw_date: Joi.string()
    .pattern(/^\d{4}-\d{2}-\d{2}/)
    .allow("", null),
  total_combinations: optionalInt,
  user_request_limit: optionalInt,
  user_combinations_requested: optionalInt,
  archive_checksum: optionalText,
}).unknown(true);

interface GameResultWire {
  winning_numbers?: number[] | null;
  bonus_number?: number | null;
  total_combinations?: number | null;
  odds?: Record<string, number | null> | null;
  stored_score_results?: { total_score?: number | null } | null;
  calculated_score_for_draw?: number | null;
  user_score?: number | null;
  win_id?: string | null;
  archive_password?: string | null;
  archive_checksum?: string | null;
}

const gameResultSchema = Joi.object<GameResultWire>({
  winning_numbers: Joi.array().items(looseInt).allow(null),
  bonus_number: optionalInt,
  total_combinations: optionalInt,
  odds: Joi.object()
    .pattern(Joi.string(), Joi.number().allow(null).empty(""))
    .allow(null),
  stored_score_results: Joi.object({ total_score: optionalInt })
    .unknown(true)
    .allow(null),
  calculated_score_for_draw: optionalInt,
  user_score: optionalInt,
  win_id: optionalText,
  archive_password: optionalText,
  archive_checksum: optionalText,
}).unknown(true);

interface CombinationWire {
  combination_sequence_id: number;
  combination_numbers: number[];
  user_requests_count: number;
}

const combinationSchema = Joi.object<CombinationWire>({
  combination_sequence_id: looseInt.required(),
  combination_numbers: Joi.array().items(looseInt).min(1).required(),
  user_requests_count: looseInt.min(0).required().messages({
    "any.required": "Missing updated request count from server",
  }),
}).unknown(true);

interface PlaycardWire {
  status: string;
  message?: string | null;
}

const playcardSchema = Joi.object<PlaycardWire>({
  status: Joi.string().required(),
  message: Joi.string().allow("", null),
}).unknown(true);

/**
 * Validate a decoded JSON body against a schema or raise DecodeError
 */
export function decode<T>(
  schema: Joi.ObjectSchema<T>,
  body: unknown,
  source: string,
): T {
  const result = schema.validate(body, {
    abortEarly: false,
    convert: true,
  });

  if (result.error) {
    throw new DecodeError(
      source,
      result.error.details.map((detail) => detail.message),
    );
  }
  return result.value;
}

export function decodeLogin(body: unknown): LoginResponse {
  const wire = decode(loginSchema.required(), body, "login response");
  return {
    code: wire.code,
    message: wire.message || null,
    data: wire.data
      ? {
          userId: wire.data.user_id,
          accountStatus: wire.data.account_status ?? null,
          membershipLevel: wire.data.membership_level ?? null,
          authToken: wire.data.auth_token,
          appVersion: wire.data.app_version ?? null,
        }
      : null,
  };
}

export function decodeRegister(body: unknown): RegisterResponse {
  const wire = decode(registerSchema.required(), body, "register response");
  return {
    status: wire.status,
    message: wire.message || "",
    userId: wire.data?.user_id ?? null,
    verificationUrl: wire.data?.verification_url || null,
  };
}

export function decodeGameInfo(body: unknown): GameInfo {
  const wire = decode(gameInfoSchema.required(), body, "game-info response");
  return {
    // Some deployments append a time of day
    drawDate: wire.draw_date ? wire.draw_date.slice(0, 10) : null,
    totalCombinations: wire.total_combinations ?? null,
    userRequestLimit: wire.user_request_limit ?? null,
    userCombinationsRequested: wire.user_combinations_requested ?? null,
    archiveChecksum: wire.archive_checksum ?? null,
  };
}

export function decodeGameResult(body: unknown): GameResultPayload {
  const wire = decode(gameResultSchema.required(), body, "game-result response");

  const odds: Record<string, number> = {};
  for (const [tier, value] of Object.entries(wire.odds ?? {})) {
    if (typeof value === "number") odds[tier] = value;
  }

  return {
    winningNumbers: wire.winning_numbers ?? [],
    bonusNumber: wire.bonus_number ?? null,
    totalCombinations: wire.total_combinations ?? null,
    odds,
    userScore:
      wire.stored_score_results?.total_score ??
      wire.calculated_score_for_draw ??
      wire.user_score ??
      null,
    winId: wire.win_id ?? null,
    archivePassword: wire.archive_password ?? null,
    archiveChecksum: wire.archive_checksum ?? null,
  };
}

export function decodeCombination(body: unknown): CombinationGrant {
  const wire = decode(combinationSchema.required(), body, "request-combination response");
  return {
    ingotId: wire.combination_sequence_id,
    numbers: wire.combination_numbers,
    userRequestsCount: wire.user_requests_count,
  };
}

export function decodePlaycard(body: unknown): PlaycardResponse {
  const wire = decode(playcardSchema.required(), body, "submit-playcard response");
  return {
    status: wire.status,
    message: wire.message || null,
  };
}
