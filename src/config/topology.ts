import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readEnum, readOptionalString } from "./env.js";

/**
 * Behaviour applied when a specialised topology is structurally modified:
 * `degrade` performs the mutation and turns the graph generic, `freeze`
 * rejects it.
 */
export type MutationMode = "degrade" | "freeze";

export const MUTATION_MODES: readonly MutationMode[] = ["degrade", "freeze"];

export interface TopologyConfig {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly mutationMode: MutationMode;
}

/**
 * Reads the `TOPOLOGY_*` environment variables. Unknown literals fall back to
 * the defaults instead of failing.
 */
export function loadTopologyConfig(): TopologyConfig {
  return {
    logLevel: readEnum("TOPOLOGY_LOG_LEVEL", LOG_LEVELS, "warn"),
    logFile: readOptionalString("TOPOLOGY_LOG_FILE") ?? null,
    mutationMode: readEnum("TOPOLOGY_MUTATION_MODE", MUTATION_MODES, "degrade"),
  };
}
