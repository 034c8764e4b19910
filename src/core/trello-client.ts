/**
 * Trello API Client
 *
 * Read-only access to boards, lists, cards and card comments over the Trello
 * REST API. Authenticates with the key + token query parameters.
 *
 * Responses are validated with zod before they reach the sync; a shape change
 * on Trello's side surfaces as a BoardServiceError rather than undefined fields.
 * Error messages carry the request path only, never the credentials.
 */

import { z } from 'zod';

import type { Board, BoardList, Card, CardComment } from './types.js';
import { BoardNotFoundError, BoardServiceAuthError, BoardServiceError } from './errors.js';

// ============================================================================
// Service Interface
// ============================================================================

export interface BoardService {
  listBoards(): Promise<Board[]>;
  getBoard(boardId: string): Promise<Board>;
  getLists(boardId: string): Promise<BoardList[]>;
  getCards(listId: string): Promise<Card[]>;
  getComments(cardId: string): Promise<CardComment[]>;
}

// ============================================================================
// Response Schemas
// ============================================================================

const boardSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    closed: z.boolean().optional(),
  })
  .transform((b): Board => ({ id: b.id, name: b.name, closed: b.closed ?? false }));

const listSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    idBoard: z.string(),
  })
  .transform((l): BoardList => ({ id: l.id, name: l.name, boardId: l.idBoard }));

const cardSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    desc: z.string().nullish(),
    idList: z.string(),
    idBoard: z.string(),
  })
  .transform((c): Card => ({
    id: c.id,
    name: c.name,
    description: c.desc ?? '',
    listId: c.idList,
    boardId: c.idBoard,
  }));

const commentActionSchema = z.object({
  id: z.string(),
  data: z.object({
    text: z.string().nullish(),
  }),
});

// Trello caps action pages at 1000
const COMMENT_PAGE_LIMIT = 1000;

// ============================================================================
// Client
// ============================================================================

export interface TrelloClientOptions {
  apiKey: string;
  apiToken: string;
  baseUrl?: string;
}

export class TrelloClient implements BoardService {
  private readonly apiKey: string;
  private readonly apiToken: string;
  private readonly baseUrl: string;

  constructor(options: TrelloClientOptions) {
    this.apiKey = options.apiKey;
    this.apiToken = options.apiToken;
    this.baseUrl = options.baseUrl ?? 'https://api.trello.com/1';
  }

  private async request<T>(
    pathname: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    query: Record<string, string> = {}
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${pathname}`);
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('token', this.apiToken);
    for (const [name, value] of Object.entries(query)) {
      url.searchParams.set(name, value);
    }

    const response = await fetch(url, {
      headers: { Accept: 'application/json' },
    });

    if (!response.ok) {
      const body = await response.text();
      if (response.status === 401) {
        throw new BoardServiceAuthError(body);
      }
      throw new BoardServiceError(
        `Trello API error: ${response.status} ${response.statusText} for ${pathname}`,
        response.status,
        body,
      );
    }

    const data: unknown = await response.json();
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new BoardServiceError(
        `Unexpected Trello response for ${pathname}: ${issues}`,
        response.status,
        JSON.stringify(data).slice(0, 500),
      );
    }
    return parsed.data;
  }

  async listBoards(): Promise<Board[]> {
    return this.request('/members/me/boards', z.array(boardSchema), {
      filter: 'open',
      fields: 'id,name,closed',
    });
  }

  async getBoard(boardId: string): Promise<Board> {
    try {
      return await this.request(`/boards/${encodeURIComponent(boardId)}`, boardSchema, {
        fields: 'id,name,closed',
      });
    } catch (error) {
      // Trello answers 400 for malformed ids and 404 for unknown ones
      if (error instanceof BoardServiceError && (error.statusCode === 404 || error.statusCode === 400)) {
        throw new BoardNotFoundError(boardId);
      }
      throw error;
    }
  }

  async getLists(boardId: string): Promise<BoardList[]> {
    return this.request(`/boards/${encodeURIComponent(boardId)}/lists`, z.array(listSchema), {
      filter: 'open',
      fields: 'id,name,idBoard',
    });
  }

  async getCards(listId: string): Promise<Card[]> {
    return this.request(`/lists/${encodeURIComponent(listId)}/cards`, z.array(cardSchema), {
      fields: 'id,name,desc,idList,idBoard',
    });
  }

  async getComments(cardId: string): Promise<CardComment[]> {
    const actions = await this.request(`/cards/${encodeURIComponent(cardId)}/actions`, z.array(commentActionSchema), {
      filter: 'commentCard',
      limit: String(COMMENT_PAGE_LIMIT),
    });

    return actions.map((action) => ({
      id: action.id,
      cardId,
      text: action.data.text ?? '',
    }));
  }
}
