import { GoldenTicketApi, type FetchLike } from '../../src/lib/api/apiClient';
import {
  ApiError,
  ApiTimeoutError,
  AuthRequiredError,
  DecodeError,
  NetworkError,
  isTransientError,
} from '../../src/lib/errors';
import { BASE_URL, FakeBackend, jsonResponse } from '../helpers/fakeBackend';

describe('Golden Ticket API Client', () => {
  let backend: FakeBackend;
  let token: string | null;

  const client = (fetch: FetchLike = backend.fetch) =>
    new GoldenTicketApi({
      baseUrl: BASE_URL,
      timeoutMs: 15000,
      resultTimeoutMs: 20000,
      getAuthToken: () => token,
      fetch,
    });

  beforeEach(() => {
    backend = new FakeBackend();
    token = 'test-token';
  });

  describe('requests', () => {
    it('should send the bearer token and query parameters', async () => {
      backend.json('GET /game-info', { draw_date: '2024-06-08' });

      await client().getGameInfo('lotto649');

      const [request] = backend.calls('GET /game-info');
      expect(request.query).toEqual({ game_name: 'lotto649' });
      expect(request.headers.get('authorization')).toBe('Bearer test-token');
    });

    it('should refuse authenticated calls without a token', async () => {
      token = null;

      await expect(client().getGameInfo('lotto649')).rejects.toBeInstanceOf(AuthRequiredError);
      expect(backend.requests).toHaveLength(0);
    });

    it('should log in without a token', async () => {
      token = null;
      backend.json('POST /login', {
        code: 'success',
        data: { user_id: '7', auth_token: 'test-token', membership_level: 'gold' },
      });

      const response = await client().login('player', 'test-password');

      expect(response).toEqual({
        code: 'success',
        message: null,
        data: {
          userId: 7,
          accountStatus: null,
          membershipLevel: 'gold',
          authToken: 'test-token',
          appVersion: null,
        },
      });
      const [request] = backend.calls('POST /login');
      expect(request.headers.get('authorization')).toBeNull();
      expect(request.body).toEqual({ username: 'player', password: 'test-password' });
    });

    it('should send snake_case playcard fields', async () => {
      backend.json('POST /submit-playcard', { status: 'success' });

      await client().submitPlaycard({
        userId: 7,
        gameName: 'lotto649',
        drawDate: '2024-06-08',
        playCardId: 3,
        ingotIds: [101, 102],
      });

      expect(backend.calls('POST /submit-playcard')[0].body).toEqual({
        user_id: 7,
        game_name: 'lotto649',
        draw_date: '2024-06-08',
        play_card_id: 3,
        ingot_ids: [101, 102],
      });
    });
  });

  describe('errors', () => {
    it('should raise ApiError with the server message', async () => {
      backend.json('GET /game-info', { message: 'Maintenance window' }, 503);

      const error = await client().getGameInfo('lotto649').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 503, endpoint: '/game-info', transient: true });
      expect(error).toHaveProperty('message', 'API Error (503) on /game-info: Maintenance window');
    });

    it('should mark client errors as definitive', async () => {
      backend.on('POST /request-combination', () => new Response('Bad request', { status: 400 }));

      const error = await client()
        .requestCombination({ gameName: 'lotto649', drawDate: '2024-06-08', combinationNumber: 1 })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ status: 400, transient: false });
      expect(isTransientError(error)).toBe(false);
    });

    it('should turn a timeout into ApiTimeoutError', async () => {
      const timingOut: FetchLike = async () => {
        const error = new Error('The operation was aborted due to timeout');
        error.name = 'TimeoutError';
        throw error;
      };

      const error = await client(timingOut).getGameResult('lotto649', '2024-06-05').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiTimeoutError);
      expect(error).toMatchObject({ timeoutMs: 20000 });
      expect(isTransientError(error)).toBe(true);
    });

    it('should turn a connection failure into NetworkError', async () => {
      const offline: FetchLike = async () => {
        throw new TypeError('fetch failed');
      };

      await expect(client(offline).getGameInfo('lotto649')).rejects.toBeInstanceOf(NetworkError);
    });

    it('should reject an undecodable success body', async () => {
      backend.on('POST /submit-playcard', () => new Response('<html>oops</html>', { status: 200 }));

      await expect(
        client().submitPlaycard({
          userId: 7,
          gameName: 'lotto649',
          drawDate: '2024-06-08',
          playCardId: 3,
          ingotIds: [101],
        }),
      ).rejects.toBeInstanceOf(DecodeError);
    });
  });

  describe('decoding', () => {
    it('should normalise loosely typed game info', async () => {
      backend.json('GET /game-info', {
        draw_date: '2024-06-08 20:30:00',
        total_combinations: '13983816',
        user_request_limit: 5.4,
        user_combinations_requested: '2',
        archive_checksum: 12345,
      });

      expect(await client().getGameInfo('lotto649')).toEqual({
        drawDate: '2024-06-08',
        totalCombinations: 13983816,
        userRequestLimit: 5,
        userCombinationsRequested: 2,
        archiveChecksum: '12345',
      });
    });

    it('should return null for an empty game-info body', async () => {
      backend.on('GET /game-info', () => new Response('', { status: 200 }));

      expect(await client().getGameInfo('lotto649')).toBeNull();
    });

    it('should prefer the stored score over calculated and plain scores', async () => {
      backend.json('GET /game-result', {
        winning_numbers: ['3', 11, 19, 27, 38, 45],
        odds: { '6/6': 13983816, broken: null },
        stored_score_results: { total_score: 40 },
        calculated_score_for_draw: 10,
        user_score: 5,
        win_id: 991,
      });

      const result = await client().getGameResult('lotto649', '2024-06-05');

      expect(result).toMatchObject({
        winningNumbers: [3, 11, 19, 27, 38, 45],
        odds: { '6/6': 13983816 },
        userScore: 40,
        winId: '991',
      });
    });

    it('should fall back to the calculated score', async () => {
      backend.json('GET /game-result', {
        winning_numbers: [],
        calculated_score_for_draw: 10,
        user_score: 5,
      });

      const result = await client().getGameResult('lotto649', '2024-06-05');

      expect(result?.userScore).toBe(10);
      expect(result?.winningNumbers).toEqual([]);
    });

    it('should require the updated request count on a combination', async () => {
      backend.json('POST /request-combination', {
        combination_sequence_id: 101,
        combination_numbers: [1, 2, 3, 4, 5, 6],
      });

      await expect(
        client().requestCombination({ gameName: 'lotto649', drawDate: '2024-06-08', combinationNumber: 42 }),
      ).rejects.toThrow('Missing updated request count from server');
    });

    it('should decode a combination grant', async () => {
      backend.on('POST /request-combination', (request) =>
        jsonResponse({
          combination_sequence_id: '101',
          combination_numbers: [1, 2, 3, 4, 5, 6],
          user_requests_count: 3,
          echoed: request.body,
        }),
      );

      const grant = await client().requestCombination({
        gameName: 'lotto649',
        drawDate: '2024-06-08',
        combinationNumber: 42,
      });

      expect(grant).toEqual({ ingotId: 101, numbers: [1, 2, 3, 4, 5, 6], userRequestsCount: 3 });
      expect(backend.calls('POST /request-combination')[0].body).toEqual({
        game_name: 'lotto649',
        draw_date: '2024-06-08',
        combination_number: 42,
      });
    });
  });
});
