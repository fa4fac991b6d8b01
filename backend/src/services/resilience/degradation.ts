import type { DependencyName } from "../../errors";
import type { CapabilityState } from "./circuitBreaker";

export type DependencyRole = "required" | "optional";

export type DegradedAction = "fail" | "bypass_cache" | "use_mock" | "omit_context";

export type Decision = { action: "proceed" } | { action: DegradedAction; role: DependencyRole };

export interface PolicyRow {
  role: DependencyRole;
  onUnavailable: DegradedAction;
}

export const DEGRADATION_POLICY = {
  durableStore: { role: "required", onUnavailable: "fail" },
  cache: { role: "optional", onUnavailable: "bypass_cache" },
  generation: { role: "optional", onUnavailable: "use_mock" },
  auxiliaryContext: { role: "optional", onUnavailable: "omit_context" }
} as const satisfies Record<DependencyName, PolicyRow>;

/**
 * Looks up what to do at a dependency boundary. Degraded dependencies (half-open
 * breaker, recent failures) still proceed; the breaker decides per call.
 */
export function decide(dependency: DependencyName, state: CapabilityState): Decision {
  if (state !== "unavailable") return { action: "proceed" };
  const row: PolicyRow = DEGRADATION_POLICY[dependency];
  return { action: row.onUnavailable, role: row.role };
}
