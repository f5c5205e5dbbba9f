export type ResponseFormat = 'json' | 'event-stream';

export interface ResponseFormatConfig {
  allowJsonOnly: boolean;
}

export interface ResponseFormatNegotiation {
  originalAccept: string;
  acceptsExplicitJson: boolean;
  acceptsExplicitEventStream: boolean;
  format: ResponseFormat;
}

function normalizeAccept(raw: string | string[] | undefined): string {
  if (Array.isArray(raw)) {
    return raw.join(',').trim();
  }
  return (raw ?? '').trim();
}

function parseMediaTypes(acceptHeader: string): Set<string> {
  const mediaTypes = new Set<string>();
  if (!acceptHeader) {
    return mediaTypes;
  }

  for (const entry of acceptHeader.split(',')) {
    const mediaType = entry.split(';', 1)[0]?.trim().toLowerCase();
    if (mediaType) {
      mediaTypes.add(mediaType);
    }
  }

  return mediaTypes;
}

/**
 * Plain JSON is only used for clients that name application/json and not text/event-stream.
 * Everyone else, including clients sending no Accept header or a wildcard, gets one SSE frame.
 */
export function negotiateResponseFormat(
  rawAccept: string | string[] | undefined,
  config: ResponseFormatConfig
): ResponseFormatNegotiation {
  const originalAccept = normalizeAccept(rawAccept);
  const mediaTypes = parseMediaTypes(originalAccept);
  const acceptsExplicitJson = mediaTypes.has('application/json');
  const acceptsExplicitEventStream = mediaTypes.has('text/event-stream');

  const format: ResponseFormat =
    config.allowJsonOnly && acceptsExplicitJson && !acceptsExplicitEventStream ? 'json' : 'event-stream';

  return {
    originalAccept,
    acceptsExplicitJson,
    acceptsExplicitEventStream,
    format
  };
}

export function toEventStreamFrame(message: unknown): string {
  return `data: ${JSON.stringify(message)}\n\n`;
}
