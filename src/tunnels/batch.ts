export type BatchClassification = "success" | "partial" | "failure";

export interface BatchResult<T> {
  total: number;
  // Every outcome that is not a failure, including skips.
  succeeded: number;
  // Tunnels left alone because they were already in the requested state.
  skipped: number;
  outcomes: T[];
  classification: BatchClassification;
}

export interface BatchVerbs {
  // "start" / "stop"
  base: string;
  // "started" / "stopped"
  past: string;
  // Reason shown for skipped tunnels: "already running" / "not running"
  skipped: string;
}

export interface BatchSummary {
  level: "success" | "warn" | "error";
  message: string;
}

export function classifyBatch(succeeded: number, total: number): BatchClassification {
  if (succeeded === total) return "success";
  if (succeeded > 0) return "partial";
  return "failure";
}

export function buildBatchResult<T>(
  outcomes: T[],
  isFailure: (outcome: T) => boolean,
  isSkip: (outcome: T) => boolean,
): BatchResult<T> {
  const total = outcomes.length;
  const succeeded = outcomes.filter((outcome) => !isFailure(outcome)).length;
  const skipped = outcomes.filter(isSkip).length;
  return { total, succeeded, skipped, outcomes, classification: classifyBatch(succeeded, total) };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function summarizeBatch<T>(result: BatchResult<T>, verbs: BatchVerbs): BatchSummary {
  switch (result.classification) {
    case "success": {
      // Only tunnels that were acted on count here; skips go in the suffix.
      const acted = result.succeeded - result.skipped;
      const suffix = result.skipped > 0 ? ` (${result.skipped} ${verbs.skipped})` : "";
      return {
        level: "success",
        message: `Successfully ${verbs.past} ${acted} tunnel(s)${suffix}`,
      };
    }
    case "partial":
      return {
        level: "warn",
        message: `${capitalize(verbs.past)} ${result.succeeded}/${result.total} tunnel(s)`,
      };
    case "failure":
      return { level: "error", message: `Failed to ${verbs.base} any tunnels` };
  }
}
