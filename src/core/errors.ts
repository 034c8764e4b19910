// ============================================================================
// cardscan Error Types
// ============================================================================

/**
 * Base error for everything cardscan raises on purpose.
 */
export class CardscanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CardscanError';
  }
}

/**
 * Thrown when required credentials or settings are missing or malformed.
 */
export class ConfigError extends CardscanError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

/**
 * Non-OK response from the Trello REST API.
 * Keeps the status code and response body for the run log.
 */
export class BoardServiceError extends CardscanError {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, responseBody: string) {
    super(message);
    this.name = 'BoardServiceError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/**
 * Thrown on HTTP 401. The API key or token is invalid or expired.
 */
export class BoardServiceAuthError extends BoardServiceError {
  constructor(responseBody: string) {
    super(
      'Trello authentication failed (401). Check TRELLO_API_KEY and TRELLO_API_TOKEN.',
      401,
      responseBody,
    );
    this.name = 'BoardServiceAuthError';
  }
}

/**
 * No board matched the given id, name or index.
 */
export class BoardNotFoundError extends CardscanError {
  readonly boardRef: string;

  constructor(boardRef: string) {
    super(`Board not found: ${boardRef}`);
    this.name = 'BoardNotFoundError';
    this.boardRef = boardRef;
  }
}

/**
 * A contact batch failed to commit. The transaction has already been rolled back.
 */
export class StoreError extends CardscanError {
  readonly cardId: string;

  constructor(message: string, cardId: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'StoreError';
    this.cardId = cardId;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
