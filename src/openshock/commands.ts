import { z } from 'zod/v4';

export const TOOL_NAMES = ['SHOCK', 'VIBRATE', 'BEEP', 'STOP'] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

/** Control type integers understood by `/2/shockers/control`. */
export const COMMAND_TYPES: Record<ToolName, number> = {
  STOP: 0,
  SHOCK: 1,
  VIBRATE: 2,
  BEEP: 3
};

export const INTENSITY_MIN = 1;
export const INTENSITY_MAX = 100;
export const DURATION_MIN_MS = 300;
export const DURATION_MAX_MS = 30_000;
export const BEEP_DEFAULT_INTENSITY = 50;

export const STOP_INTENSITY = 0;
export const STOP_DURATION_MS = 300;

export interface DownstreamCommand {
  id: string;
  type: number;
  intensity: number;
  duration: number;
}

export interface IntensityAdjustment {
  targetId: string;
  requested: number;
  applied: number;
}

const toolNameSchema = z.enum(TOOL_NAMES);

export function parseToolName(value: unknown): ToolName | null {
  const parsed = toolNameSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function customNameFor(tool: ToolName): string {
  return `MCP-${tool}`;
}
