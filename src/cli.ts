#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { loadTopologyConfig } from "./config/topology.js";
import { TopologyError } from "./errors.js";
import type { Graph } from "./graph/model.js";
import type { GraphOptions } from "./graph/options.js";
import type { GraphSummary } from "./graph/types.js";
import { BMesh, BRing, OPG, UMesh, URing } from "./topology/basic.js";
import { StructuredLogger } from "./logger.js";
import { BGrid, BTorus } from "./topology/composite.js";

const TOPOLOGY_BUILDERS = {
  uring: (sizes: number[], options: GraphOptions) => new URing(single("uring", sizes), options),
  bring: (sizes: number[], options: GraphOptions) => new BRing(single("bring", sizes), options),
  umesh: (sizes: number[], options: GraphOptions) => new UMesh(single("umesh", sizes), options),
  bmesh: (sizes: number[], options: GraphOptions) => new BMesh(single("bmesh", sizes), options),
  opg: (sizes: number[], options: GraphOptions) => {
    if (sizes.length > 0) {
      throw new Error("opg takes no size");
    }
    return new OPG(options);
  },
  grid: (sizes: number[], options: GraphOptions) => new BGrid(sizes, options),
  torus: (sizes: number[], options: GraphOptions) => new BTorus(sizes, options),
} satisfies Record<string, (sizes: number[], options: GraphOptions) => Graph>;

type CliTopology = keyof typeof TOPOLOGY_BUILDERS;

interface CliOptions {
  readonly topology: CliTopology;
  readonly sizes: number[];
  readonly format: "text" | "json";
  readonly eccentricities: boolean;
}

interface CliReport extends GraphSummary {
  readonly eccentricities?: Array<number | null>;
}

function single(name: string, sizes: number[]): number {
  if (sizes.length !== 1) {
    throw new Error(`${name} expects exactly one size`);
  }
  return sizes[0];
}

function isCliTopology(value: string): value is CliTopology {
  return Object.prototype.hasOwnProperty.call(TOPOLOGY_BUILDERS, value);
}

function parseArgs(argv: string[]): CliOptions {
  const [kind, ...rest] = argv;
  if (!kind || kind.startsWith("--")) {
    throw new Error("First positional argument must be the topology kind");
  }
  const topology = kind.toLowerCase();
  if (!isCliTopology(topology)) {
    throw new Error(`Unknown topology '${kind}'`);
  }

  const sizes: number[] = [];
  let format: "text" | "json" = "text";
  let withEccentricities = false;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new Error("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--eccentricities":
        withEccentricities = true;
        break;
      default: {
        if (token.startsWith("--")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        if (!/^\d+$/.test(token)) {
          throw new Error(`Size '${token}' is not a non-negative integer`);
        }
        sizes.push(Number.parseInt(token, 10));
      }
    }
  }

  return { topology, sizes, format, eccentricities: withEccentricities };
}

/**
 * Logger handed to the builders. JSON reports keep stdout for the report
 * itself, so log lines then only reach the configured log file.
 */
function createCliLogger(format: CliOptions["format"]): StructuredLogger {
  const config = loadTopologyConfig();
  return new StructuredLogger({ level: config.logLevel, logFile: config.logFile, silent: format === "json" });
}

function buildReport(options: CliOptions, logger: StructuredLogger = createCliLogger(options.format)): CliReport {
  const graph = TOPOLOGY_BUILDERS[options.topology](options.sizes, { logger });
  const summary = graph.summary();
  return options.eccentricities ? { ...summary, eccentricities: graph.eccentricities() } : summary;
}

function formatTextReport(report: CliReport): string[] {
  const lines = [
    `Name: ${report.name}`,
    `Kind: ${report.kind}`,
    `Vertices: ${report.vertices}`,
    `Edges: ${report.edges}`,
    `Diameter: ${report.diameter}`,
  ];
  if (report.eccentricities) {
    const rendered = report.eccentricities.map((value) => (value === null ? "-" : String(value)));
    lines.push(`Eccentricities: ${rendered.join(", ")}`);
  }
  return lines;
}

function main(argv: string[]): void {
  if (argv.length === 0) {
    printUsage();
    process.exit(1);
  }

  const options = parseArgs(argv);
  const report = buildReport(options);
  if (options.format === "json") {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  for (const line of formatTextReport(report)) {
    console.log(line);
  }
}

function printUsage(): void {
  console.log("Usage: fabric-topology <kind> [sizes...] [--format json|text] [--eccentricities]\n");
  console.log(`Kinds: ${Object.keys(TOPOLOGY_BUILDERS).join(", ")}`);
  console.log("Examples:");
  console.log("  fabric-topology bring 8");
  console.log("  fabric-topology grid 4 4 2 --format json");
  console.log("  fabric-topology umesh 3 --eccentricities");
}

/**
 * Whether the script named by `argv[1]` is the module at {@link moduleUrl}.
 * npm installs `bin` entries as symlinks, so both sides are resolved first.
 */
function isEntryPoint(executedFromCli: string | undefined, moduleUrl: string): boolean {
  if (!executedFromCli) {
    return false;
  }
  try {
    return realpathSync(executedFromCli) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  try {
    main(process.argv.slice(2));
  } catch (error) {
    const code = error instanceof TopologyError ? ` [${error.code}]` : "";
    console.error(`${error instanceof Error ? error.message : String(error)}${code}`);
    process.exit(1);
  }
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  parseArgs,
  buildReport,
  createCliLogger,
  formatTextReport,
  isEntryPoint,
};
