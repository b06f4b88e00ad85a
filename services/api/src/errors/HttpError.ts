export class HttpError extends Error {
  statusCode: number;

  /**
   * Public-facing error message.
   * Keep this safe to return to clients.
   */
  override message: string;

  /** Stable machine-readable code returned alongside the message. */
  code: string;

  constructor(
    statusCode: number,
    publicMessage: string,
    opts?: { cause?: unknown; code?: string }
  ) {
    super(publicMessage, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.message = publicMessage;
    this.code = opts?.code ?? 'HTTP_ERROR';
  }
}
