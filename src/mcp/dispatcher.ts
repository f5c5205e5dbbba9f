import {
  ErrorCode,
  type CallToolResult,
  type InitializeResult,
  type ListToolsResult
} from '@modelcontextprotocol/sdk/types.js';
import * as z from 'zod/v4';
import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import { actionableErrorFields, asGatewayError, type ToolErrorCode } from '../errors.js';
import { customNameFor, parseToolName, type IntensityAdjustment, type ToolName } from '../openshock/commands.js';
import type { DownstreamResult, ShockerController } from '../openshock/client.js';
import { translate } from '../openshock/translator.js';
import type { SafetyClamp } from '../safety/safetyClamp.js';
import { listTools } from './toolCatalog.js';

export const PROTOCOL_VERSION = '2024-11-05';

/**
 * Invalid tool arguments share the internal-error code with unexpected faults,
 * so clients see the same code for both.
 */
export const INVALID_ARGUMENT_ERROR_CODE: number = ErrorCode.InternalError;

export type RequestId = string | number | null;

export interface RpcError {
  code: number;
  message: string;
}

export type OutboundEnvelope =
  | { jsonrpc: '2.0'; result: Record<string, unknown>; id: RequestId }
  | { jsonrpc: '2.0'; error: RpcError; id: RequestId };

export interface DispatcherDependencies {
  config: Pick<AppConfig, 'serverName' | 'serverVersion'>;
  logger: Logger;
  client: ShockerController;
  clamp: SafetyClamp;
}

export interface RequestDispatcher {
  dispatch(body: unknown): Promise<OutboundEnvelope>;
}

type HandlerOutcome = { ok: true; result: Record<string, unknown> } | { ok: false; error: RpcError };

const requestIdSchema = z.union([z.string(), z.number().int(), z.null()]);

const inboundEnvelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  method: z.string(),
  params: z.record(z.string(), z.unknown()).optional(),
  id: requestIdSchema.optional()
});

type InboundEnvelope = z.infer<typeof inboundEnvelopeSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function salvageId(body: unknown): RequestId {
  if (!isRecord(body)) {
    return null;
  }
  const parsed = requestIdSchema.safeParse(body.id);
  return parsed.success ? parsed.data : null;
}

function success(result: Record<string, unknown>): HandlerOutcome {
  return { ok: true, result };
}

function failure(code: number, message: string): HandlerOutcome {
  return { ok: false, error: { code, message } };
}

function invalidArgument(message: string): HandlerOutcome {
  return failure(INVALID_ARGUMENT_ERROR_CODE, `Internal error: ${message}`);
}

function describeRejection(result: Extract<DownstreamResult, { ok: false }>): string {
  const statusLine = [`HTTP ${result.status}`, result.statusText].filter(Boolean).join(' ');
  const body = result.body.trim();
  return body ? `${statusLine}: ${body}` : statusLine;
}

function toolErrorResult(
  tool: ToolName,
  code: ToolErrorCode,
  detail: string,
  statusCode?: number
): CallToolResult {
  const error = {
    code,
    message: detail,
    ...(statusCode === undefined ? {} : { statusCode }),
    ...actionableErrorFields(code)
  };
  return {
    isError: true,
    content: [
      {
        type: 'text',
        text: `Error executing ${tool} command: ${detail}`
      }
    ],
    structuredContent: {
      error
    }
  };
}

export function formatSuccessText(
  tool: ToolName,
  shockerCount: number,
  adjustments: readonly IntensityAdjustment[],
  ceiling: number,
  response: unknown
): string {
  const lines = [`Successfully executed ${tool} command on ${shockerCount} shocker(s).`];

  if (adjustments.length) {
    lines.push('', `Security adjustments applied (max shock intensity ${ceiling}):`);
    for (const adjustment of adjustments) {
      lines.push(
        `- ${adjustment.targetId}: intensity reduced from ${adjustment.requested} to ${adjustment.applied}`
      );
    }
  }

  lines.push('', `Response: ${toJsonText(response)}`);
  return lines.join('\n');
}

export function buildDispatcher(deps: DispatcherDependencies): RequestDispatcher {
  const { config, logger, client, clamp } = deps;

  function handleInitialize(): InitializeResult {
    return {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {
        tools: {
          listChanged: false
        }
      },
      serverInfo: {
        name: config.serverName,
        version: config.serverVersion
      }
    };
  }

  function handleToolsList(): ListToolsResult {
    return {
      tools: listTools(clamp.effectiveCeiling())
    };
  }

  async function handleToolsCall(params: Record<string, unknown>): Promise<HandlerOutcome> {
    const tool = parseToolName(params.name);
    if (!tool) {
      return invalidArgument(`Unknown tool: ${String(params.name)}`);
    }

    const args = params.arguments ?? {};
    if (!isRecord(args)) {
      return invalidArgument("'arguments' must be an object");
    }
    if (args.shockers === undefined) {
      return invalidArgument("Missing 'shockers' parameter");
    }
    if (!Array.isArray(args.shockers)) {
      return invalidArgument("'shockers' must be an array");
    }

    const translation = translate(tool, args.shockers, clamp);
    if (!translation.ok) {
      logger.warn(
        { tool, index: translation.error.index, targetId: translation.error.targetId },
        `Rejected ${tool} arguments: ${translation.error.message}`
      );
      return invalidArgument(translation.error.message);
    }

    const { commands, adjustments } = translation;
    if (adjustments.length) {
      logger.warn(
        { tool, ceiling: clamp.effectiveCeiling(), adjustments },
        'Shock intensity reduced to the configured safety ceiling'
      );
    }

    logger.info({ tool, shockers: commands.length }, 'Sending control request to OpenShock API');

    let downstream: DownstreamResult;
    try {
      downstream = await client.send(commands, customNameFor(tool));
    } catch (error) {
      const mapped = asGatewayError(error);
      if (mapped.code !== 'NETWORK' && mapped.code !== 'TIMEOUT') {
        throw mapped;
      }
      logger.error({ tool, code: mapped.code, error: mapped.message }, 'OpenShock API request failed');
      return success(toolErrorResult(tool, mapped.code, mapped.message));
    }

    if (!downstream.ok) {
      const code: ToolErrorCode = downstream.status === 401 || downstream.status === 403 ? 'AUTH' : 'DOWNSTREAM_ERROR';
      logger.error({ tool, status: downstream.status }, 'OpenShock API rejected the control request');
      return success(toolErrorResult(tool, code, describeRejection(downstream), downstream.status));
    }

    logger.info({ tool, status: downstream.status }, 'OpenShock API request successful');

    const result: CallToolResult = {
      content: [
        {
          type: 'text',
          text: formatSuccessText(tool, commands.length, adjustments, clamp.effectiveCeiling(), downstream.body)
        }
      ],
      structuredContent: {
        result: {
          tool,
          shockerCount: commands.length,
          commands,
          adjustments,
          response: downstream.body
        }
      }
    };
    return success(result);
  }

  async function route(envelope: InboundEnvelope): Promise<HandlerOutcome> {
    const params = envelope.params ?? {};
    switch (envelope.method) {
      case 'initialize':
        return success(handleInitialize());
      case 'tools/list':
        return success(handleToolsList());
      case 'tools/call':
        return handleToolsCall(params);
      default:
        logger.warn({ method: envelope.method }, 'Unknown JSON-RPC method');
        return failure(ErrorCode.MethodNotFound, `Method not found: ${envelope.method}`);
    }
  }

  async function dispatch(body: unknown): Promise<OutboundEnvelope> {
    const parsed = inboundEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      const id = salvageId(body);
      logger.warn({ id }, 'Rejected malformed JSON-RPC envelope');
      return { jsonrpc: '2.0', error: { code: ErrorCode.InvalidRequest, message: 'Invalid Request' }, id };
    }

    const envelope = parsed.data;
    const id = envelope.id ?? null;
    logger.info({ method: envelope.method, id }, 'Processing JSON-RPC request');

    let outcome: HandlerOutcome;
    try {
      outcome = await route(envelope);
    } catch (error) {
      const mapped = asGatewayError(error);
      logger.error({ method: envelope.method, code: mapped.code, error: mapped.message }, 'Error processing request');
      outcome = failure(ErrorCode.InternalError, `Internal error: ${mapped.message}`);
    }

    if (!outcome.ok) {
      return { jsonrpc: '2.0', error: outcome.error, id };
    }
    logger.debug({ method: envelope.method, id }, 'Request processed');
    return { jsonrpc: '2.0', result: outcome.result, id };
  }

  return { dispatch };
}
