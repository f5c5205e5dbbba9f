import type { Logger } from 'pino';

import { ensureError, GatewayError } from '../errors.js';
import type { DownstreamCommand } from './commands.js';

export interface OpenShockClientOptions {
  baseUrl: string;
  apiToken: string;
  timeoutMs: number;
  userAgent: string;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

export type DownstreamResult =
  | { ok: true; status: number; body: unknown }
  | { ok: false; status: number; statusText: string; body: string };

/** The one call the dispatcher makes per `tools/call`. */
export interface ShockerController {
  send(commands: readonly DownstreamCommand[], label: string): Promise<DownstreamResult>;
}

export const CONTROL_PATH = '/2/shockers/control';

function parseBody(rawText: string, contentType: string): unknown {
  const trimmed = rawText.trim();
  if (!trimmed) {
    return null;
  }

  const looksLikeJson = trimmed.startsWith('{') || trimmed.startsWith('[');
  if (contentType.includes('application/json') || looksLikeJson) {
    try {
      return JSON.parse(trimmed);
    } catch {
      return rawText;
    }
  }

  return rawText;
}

export class OpenShockClient implements ShockerController {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenShockClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private controlUrl(): URL {
    // Keep any path prefix on the base URL, e.g. a reverse proxy mount.
    const base = this.options.baseUrl.endsWith('/') ? this.options.baseUrl : `${this.options.baseUrl}/`;
    return new URL(CONTROL_PATH.slice(1), base);
  }

  /** The timeout and the NETWORK/TIMEOUT mapping cover the body read as well as the headers. */
  private async executeRequest(url: URL, init: RequestInit): Promise<{ response: Response; rawText: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        ...init,
        signal: controller.signal
      });
      const rawText = await response.text();
      return { response, rawText };
    } catch (error) {
      if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
        throw new GatewayError('TIMEOUT', `Request timed out after ${this.options.timeoutMs}ms for ${url.pathname}`, {
          cause: error
        });
      }
      throw new GatewayError('NETWORK', `Network failure for ${url.pathname}: ${ensureError(error).message}`, {
        cause: error
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  async send(commands: readonly DownstreamCommand[], label: string): Promise<DownstreamResult> {
    const url = this.controlUrl();
    const payload = {
      shocks: commands,
      customName: label
    };

    this.options.logger.debug(
      { url: url.toString(), customName: label, shocks: commands.length },
      'OpenShock control request'
    );

    const { response, rawText } = await this.executeRequest(url, {
      method: 'POST',
      headers: {
        OpenShockToken: this.options.apiToken,
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': this.options.userAgent
      },
      body: JSON.stringify(payload)
    });

    if (!response.ok) {
      this.options.logger.debug(
        { url: url.toString(), status: response.status },
        'OpenShock control request rejected'
      );
      return {
        ok: false,
        status: response.status,
        statusText: response.statusText,
        body: rawText
      };
    }

    return {
      ok: true,
      status: response.status,
      body: parseBody(rawText, response.headers.get('content-type') ?? '')
    };
  }
}
