/**
 * Categories of synthesis errors, by what went wrong at the provider.
 */
export type SynthesisErrorCategory = 'VALIDATION' | 'AUTH' | 'QUOTA' | 'TIMEOUT' | 'SERVER' | 'FAILED_STATUS';

/**
 * Error raised by synthesis engines, carrying enough context to tell a bad request
 * apart from a provider outage in logs and job failure reasons.
 */
export class SynthesisError extends Error {
  /** Error category */
  category: SynthesisErrorCategory;
  /** HTTP status code if applicable */
  statusCode?: number;
  /** Provider identifier */
  provider?: string;
  /** Request ID for tracing */
  requestId?: string | null;
  /** Message of the underlying cause */
  causeMessage?: string;

  constructor(options: {
    message: string;
    category: SynthesisErrorCategory;
    statusCode?: number;
    provider?: string;
    requestId?: string | null;
    cause?: unknown;
  }) {
    super(options.message);
    this.name = 'SynthesisError';
    this.category = options.category;
    if (options.statusCode !== undefined) this.statusCode = options.statusCode;
    if (options.provider !== undefined) this.provider = options.provider;
    if (options.requestId !== undefined) this.requestId = options.requestId;
    const cm = options.cause instanceof Error ? options.cause.message : undefined;
    if (cm !== undefined) this.causeMessage = cm;
  }

  toJSON() {
    return {
      name: 'SynthesisError',
      message: this.message,
      category: this.category,
      statusCode: this.statusCode,
      provider: this.provider,
      requestId: this.requestId
    } satisfies Record<string, unknown>;
  }
}

/**
 * Maps an HTTP status from a provider to an error category.
 */
export function mapStatusToCategory(status: number): SynthesisErrorCategory {
  if (status === 400 || status === 422) return 'VALIDATION';
  if (status === 401 || status === 403) return 'AUTH';
  if (status === 429) return 'QUOTA';
  return 'SERVER';
}
