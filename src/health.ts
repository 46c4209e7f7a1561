// src/health.ts

/**
 * Health status of a component.
 */
export type HealthStatus = "healthy" | "degraded" | "unhealthy";

/**
 * Health check result for a single component.
 */
export interface ComponentHealth {
  /** Name of the component */
  name: string;
  /** Health status */
  status: HealthStatus;
  /** Optional message providing details */
  message?: string;
  /** Optional metrics or details */
  details?: Record<string, unknown>;
}

/**
 * Health report for a server and the connections it holds.
 */
export interface HealthReport {
  /** Overall health status (worst of all components) */
  status: HealthStatus;
  timestamp: Date;
  components: ComponentHealth[];
  uptimeMs: number;
}

/**
 * Interface for components that support health checks.
 */
export interface HealthCheckable {
  getHealth(): ComponentHealth;
}

/**
 * Combines multiple health statuses, returning the worst one.
 * Priority: unhealthy > degraded > healthy
 */
export function combineHealthStatus(statuses: HealthStatus[]): HealthStatus {
  if (statuses.includes("unhealthy")) return "unhealthy";
  if (statuses.includes("degraded")) return "degraded";
  return "healthy";
}

/**
 * Builds a report from component checks. A check that throws counts as
 * unhealthy under the component's name.
 */
export function buildHealthReport(
  components: Array<[name: string, component: HealthCheckable]>,
  startTime: number,
): HealthReport {
  const healths: ComponentHealth[] = components.map(([name, component]) => {
    try {
      return component.getHealth();
    } catch (err) {
      return {
        name,
        status: "unhealthy",
        message: `Health check failed: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
  });

  return {
    status: combineHealthStatus(healths.map((c) => c.status)),
    timestamp: new Date(),
    components: healths,
    uptimeMs: Date.now() - startTime,
  };
}
