import os from "node:os";

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(Math.round(ms))}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  if (ms < 3600_000) {
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.floor((ms % 60_000) / 1000);
    return `${String(minutes)}m ${String(seconds)}s`;
  }
  const hours = Math.floor(ms / 3600_000);
  const minutes = Math.floor((ms % 3600_000) / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${String(hours)}h ${String(minutes)}m ${String(seconds)}s`;
}

export interface DurationStats {
  min: number;
  max: number;
  avg: number;
  median: number;
  p95: number;
}

/**
 * Summary statistics over query times of a run
 */
export function calculateStats(values: readonly number[]): DurationStats {
  if (values.length === 0) {
    return { min: 0, max: 0, avg: 0, median: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: sum / sorted.length,
    median: sorted[Math.floor(sorted.length / 2)] ?? 0,
    p95: sorted[Math.floor(sorted.length * 0.95)] ?? 0,
  };
}

/**
 * Host the harness ran on, attached to every query summary
 */
export interface EnvironmentInfo {
  hostname: string;
  /** Total system memory in GB */
  totalMemoryGB: number;
  cpuCores: number;
  cpuModel: string;
  platform: string;
  osRelease: string;
  nodeVersion: string;
}

export function getEnvironmentInfo(): EnvironmentInfo {
  const cpus = os.cpus();
  return {
    hostname: os.hostname(),
    totalMemoryGB: Math.round(os.totalmem() / (1024 * 1024 * 1024)),
    cpuCores: cpus.length,
    cpuModel: cpus[0]?.model ?? "Unknown",
    platform: os.platform(),
    osRelease: os.release(),
    nodeVersion: process.version,
  };
}

/**
 * Millisecond clock; injectable so runs can be replayed with fixed times.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface Logger {
  log(message: string): void;
  error(message: string): void;
}
