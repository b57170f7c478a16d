import { loadTopologyConfig, type MutationMode } from "../config/topology.js";
import { StructuredLogger } from "../logger.js";

/** Per-instance overrides accepted by every graph constructor. */
export interface GraphOptions {
  readonly logger?: StructuredLogger;
  readonly mutationMode?: MutationMode;
}

export interface ResolvedGraphOptions {
  readonly logger: StructuredLogger;
  readonly mutationMode: MutationMode;
}

let sharedLogger: StructuredLogger | null = null;

/** Logger used when a constructor receives none, created from the environment on first use. */
export function getDefaultLogger(): StructuredLogger {
  if (!sharedLogger) {
    const config = loadTopologyConfig();
    sharedLogger = new StructuredLogger({ level: config.logLevel, logFile: config.logFile });
  }
  return sharedLogger;
}

/** Replaces the shared default logger; `null` restores the environment-driven one. */
export function setDefaultLogger(logger: StructuredLogger | null): void {
  sharedLogger = logger;
}

export function resolveGraphOptions(options: GraphOptions = {}): ResolvedGraphOptions {
  return {
    logger: options.logger ?? getDefaultLogger(),
    mutationMode: options.mutationMode ?? loadTopologyConfig().mutationMode,
  };
}
