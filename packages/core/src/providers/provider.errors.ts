export abstract class ProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Local failure around the request: headers, JSON encode/decode, transport, abort. */
export class ExecutionError extends ProviderError {}

/** The backend answered with a non-2xx status. `message` is the raw body. */
export class RequestFailedError extends ProviderError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(body);
    this.status = status;
    this.body = body;
  }
}

/** Usage statistics were missing or unreadable. Recoverable. */
export class UsageError extends ProviderError {}
