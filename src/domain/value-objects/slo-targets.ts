export interface SloTargets {
  /** Availability target for the ratio families, in percent */
  readonly availabilityPercent: number;
  /** EC2 CPU and memory ceiling, in percent */
  readonly cpuPercent: number;
  /** RDS CPU ceiling, in percent */
  readonly rdsCpuPercent: number;
  /** RDS read/write latency ceiling, in milliseconds */
  readonly latencyMs: number;
}

export const DEFAULT_SLO_TARGETS: SloTargets = Object.freeze({
  availabilityPercent: 99.9,
  cpuPercent: 80,
  rdsCpuPercent: 80,
  latencyMs: 10,
});

export function createSloTargets(overrides: Partial<SloTargets> = {}): SloTargets {
  return Object.freeze({ ...DEFAULT_SLO_TARGETS, ...overrides });
}

/**
 * CloudWatch publishes RDS latency in seconds.
 */
export function latencyTargetSeconds(targets: SloTargets): number {
  return targets.latencyMs / 1000;
}

export function sloTargetLabel(percent: number): string {
  return `SLO Target (${percent}%)`;
}
