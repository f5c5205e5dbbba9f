import type { SafetyClamp } from '../safety/safetyClamp.js';
import {
  BEEP_DEFAULT_INTENSITY,
  COMMAND_TYPES,
  DURATION_MAX_MS,
  DURATION_MIN_MS,
  INTENSITY_MAX,
  INTENSITY_MIN,
  STOP_DURATION_MS,
  STOP_INTENSITY,
  type DownstreamCommand,
  type IntensityAdjustment,
  type ToolName
} from './commands.js';

export interface ValidationError {
  kind: 'validation';
  message: string;
  index?: number;
  targetId?: string;
}

export type TranslationResult =
  | { ok: true; commands: DownstreamCommand[]; adjustments: IntensityAdjustment[] }
  | { ok: false; error: ValidationError };

type TargetRecord = Record<string, unknown>;

function isRecord(value: unknown): value is TargetRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, index: number, targetId?: string): TranslationResult {
  return {
    ok: false,
    error: {
      kind: 'validation',
      message,
      index,
      ...(targetId === undefined ? {} : { targetId })
    }
  };
}

type BoundedRead = { ok: true; value: number } | { ok: false; message: string };

function readBounded(
  targetId: string,
  field: 'intensity' | 'duration',
  value: unknown,
  min: number,
  max: number
): BoundedRead {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return {
      ok: false,
      message: `Shocker ${targetId}: ${field} must be an integer between ${min} and ${max} (got ${JSON.stringify(value)})`
    };
  }
  if (value < min) {
    return { ok: false, message: `Shocker ${targetId}: ${field} must be at least ${min} (got ${value})` };
  }
  if (value > max) {
    return { ok: false, message: `Shocker ${targetId}: ${field} must be at most ${max} (got ${value})` };
  }
  return { ok: true, value };
}

/** BEEP falls back to a default intensity only when the field is missing, not when it is null. */
function normalizeTarget(tool: ToolName, target: TargetRecord): TargetRecord {
  if (tool === 'BEEP' && !Object.hasOwn(target, 'intensity')) {
    return { ...target, intensity: BEEP_DEFAULT_INTENSITY };
  }
  return target;
}

/**
 * Turns the `shockers` argument of one tool call into a control batch.
 *
 * The first invalid target rejects the whole batch. Commands keep the order of the input.
 */
export function translate(tool: ToolName, targets: readonly unknown[], clamp: SafetyClamp): TranslationResult {
  const commands: DownstreamCommand[] = [];
  const adjustments: IntensityAdjustment[] = [];
  const type = COMMAND_TYPES[tool];

  for (const [index, raw] of targets.entries()) {
    if (!isRecord(raw)) {
      return invalid(`Shocker entry at index ${index} must be an object`, index);
    }

    const id = raw.id;
    if (id === undefined || id === null || id === '') {
      return invalid('Missing shocker ID', index);
    }
    if (typeof id !== 'string') {
      return invalid('Shocker ID must be a string', index);
    }

    if (tool === 'STOP') {
      commands.push({ id, type, intensity: STOP_INTENSITY, duration: STOP_DURATION_MS });
      continue;
    }

    const target = normalizeTarget(tool, raw);
    const intensity = target.intensity;
    const duration = target.duration;
    if (intensity === undefined || intensity === null || duration === undefined || duration === null) {
      return invalid(`${tool} requires intensity and duration`, index, id);
    }

    const intensityRead = readBounded(id, 'intensity', intensity, INTENSITY_MIN, INTENSITY_MAX);
    if (!intensityRead.ok) {
      return invalid(intensityRead.message, index, id);
    }
    const durationRead = readBounded(id, 'duration', duration, DURATION_MIN_MS, DURATION_MAX_MS);
    if (!durationRead.ok) {
      return invalid(durationRead.message, index, id);
    }

    const requested = intensityRead.value;
    const decision = clamp.clamp(tool, requested);
    if (decision.adjusted) {
      adjustments.push({ targetId: id, requested, applied: decision.applied });
    }

    commands.push({ id, type, intensity: decision.applied, duration: durationRead.value });
  }

  return { ok: true, commands, adjustments };
}
