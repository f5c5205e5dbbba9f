import { INTENSITY_MAX, type ToolName } from '../openshock/commands.js';

export interface ClampDecision {
  applied: number;
  adjusted: boolean;
}

/**
 * Ceiling on SHOCK intensity, fixed for the lifetime of the process.
 *
 * VIBRATE and BEEP intensities are never limited.
 */
export class SafetyClamp {
  private readonly ceiling: number;

  constructor(private readonly maxShockIntensity: number) {
    this.ceiling = maxShockIntensity <= 0 ? INTENSITY_MAX : Math.min(maxShockIntensity, INTENSITY_MAX);
  }

  /** True when a positive limit is configured, even if it equals 100. */
  get limited(): boolean {
    return this.maxShockIntensity > 0;
  }

  effectiveCeiling(): number {
    return this.ceiling;
  }

  clamp(tool: ToolName, requested: number): ClampDecision {
    if (tool !== 'SHOCK' || !this.limited || requested <= this.ceiling) {
      return { applied: requested, adjusted: false };
    }
    return { applied: this.ceiling, adjusted: true };
  }
}
