/**
 * GeometryDebugLogger - Records degenerate inputs seen by the predicate suite
 *
 * Enable this when a hit test behaves unexpectedly: every zero-length line,
 * zero-radius circle, collapsed rectangle, concentric circle pair or parallel
 * line pair that reaches a predicate is captured with its operands.
 * The output can be copied and used to create test setups.
 */

import type { Vector2 } from "@/types";

export type DegenerateCase =
  | "zero-length-line" // Segment start and end coincide
  | "zero-radius-circle" // Circle collapses to its center
  | "zero-size-rect" // Rectangle collapses to a segment or a point
  | "concentric-circles" // Circle/circle with coincident centers
  | "parallel-lines"; // Line/line with a zero determinant

/**
 * Debug log entry for a single degenerate input.
 */
export interface GeometryDebugLog {
  timestamp: number;
  kind: DegenerateCase;
  /** Predicate that observed the case, e.g. "intersects(circle, circle)" */
  source: string;
  points: Vector2[];
}

/**
 * Global debug logger instance.
 */
class GeometryDebugLoggerImpl {
  private enabled = false;
  private logs: GeometryDebugLog[] = [];
  private maxLogs = 100;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[GEOMETRY DEBUG] Logging enabled. Use GeometryDebugLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[GEOMETRY DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record a degenerate input. No-op while disabled.
   */
  logDegenerate(kind: DegenerateCase, source: string, points: readonly Vector2[]): void {
    if (!this.enabled) return;

    const log: GeometryDebugLog = {
      timestamp: Date.now(),
      kind,
      source,
      points: points.map((p) => ({ x: p.x, y: p.y })),
    };

    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    const where = log.points.map((p) => `(${p.x}, ${p.y})`).join(" ");
    console.log(`[GEOMETRY DEBUG] ${kind} in ${source}: ${where}`);
  }

  /**
   * Get all captured logs, oldest first.
   */
  getLogs(): readonly GeometryDebugLog[] {
    return [...this.logs];
  }

  /**
   * Print all captured logs as JSON and return the string.
   */
  dump(): string {
    const output = JSON.stringify(this.logs, null, 2);
    console.log(output);
    return output;
  }

  clear(): void {
    this.logs = [];
  }
}

export const GeometryDebugLogger = new GeometryDebugLoggerImpl();
