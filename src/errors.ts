export type ErrorCode = 'AUTH' | 'NETWORK' | 'TIMEOUT' | 'DOWNSTREAM_ERROR' | 'INTERNAL';

/** Codes a failed tool call can carry in `structuredContent.error`; INTERNAL faults become JSON-RPC errors instead. */
export type ToolErrorCode = Exclude<ErrorCode, 'INTERNAL'>;

export interface ActionableErrorFields {
  retryable: boolean;
  fixHint: string;
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ToolErrorCode, ActionableErrorFields> = {
  AUTH: {
    retryable: false,
    fixHint: 'Verify the OpenShock API token configured for this gateway.'
  },
  NETWORK: {
    retryable: true,
    fixHint: 'Check that the OpenShock API is reachable from the gateway, then call the tool again.'
  },
  TIMEOUT: {
    retryable: true,
    fixHint: 'The OpenShock API did not answer in time; call the tool again or raise OPENSHOCK_TIMEOUT_MS.'
  },
  DOWNSTREAM_ERROR: {
    retryable: false,
    fixHint: 'Inspect the OpenShock response; the shocker may be offline, paused or not shared with this token.'
  }
};

export function actionableErrorFields(code: ToolErrorCode): ActionableErrorFields {
  const defaults = ACTIONABLE_ERROR_DEFAULTS[code];
  return {
    retryable: defaults.retryable,
    fixHint: defaults.fixHint
  };
}

export class GatewayError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'GatewayError';
    this.code = code;
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asGatewayError(value: unknown): GatewayError {
  if (value instanceof GatewayError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError') {
    return new GatewayError('TIMEOUT', err.message, { cause: err });
  }

  return new GatewayError('INTERNAL', err.message, { cause: err });
}
