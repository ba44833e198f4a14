import { formatRouteSummary, renderRouteHtml } from "@gridroute/render";
import {
  buildGridFromPlan,
  isRouteEngineError,
  parseDeliveryConfig,
  RouteOptimizer
} from "@gridroute/route-engine";
import type { BaseLogger } from "pino";
import { parseArgs, USAGE } from "./args.js";

export type CliIo = {
  readFile(path: string): Promise<string>;
  writeFile(path: string, contents: string): Promise<void>;
  print(text: string): void;
  logger: BaseLogger;
};

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readConfig(path: string, io: CliIo): Promise<unknown> {
  const contents = await io.readFile(path);
  try {
    return JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file '${path}' is not valid JSON: ${reason}`);
  }
}

/** Loads a delivery config, optimizes it, writes the HTML map and prints a summary. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const { logger } = io;
  let configPath = "config.json";

  try {
    const options = parseArgs(argv);
    if (options.help) {
      io.print(USAGE);
      return 0;
    }
    configPath = options.configPath;

    const plan = parseDeliveryConfig(await readConfig(configPath, io));
    if (plan.deliveryAddresses.length === 0) {
      logger.warn({ configPath }, "no delivery addresses configured, nothing to optimize");
      return 0;
    }

    const strategy = options.strategy ?? plan.strategy;
    const grid = buildGridFromPlan(plan);
    const optimizer = new RouteOptimizer(grid, { logger, maxIterations: plan.maxIterations });
    logger.info(
      { strategy, deliveries: plan.deliveryAddresses.length, grid: `${grid.width}x${grid.height}` },
      "optimizing route"
    );
    const route = optimizer.optimize(plan.startPoi, plan.deliveryAddresses, strategy);

    await io.writeFile(options.outputFile, renderRouteHtml(grid, route, { nodes: plan.nodes }));
    io.print(formatRouteSummary(route, { outputFile: options.outputFile }));
    return 0;
  } catch (error) {
    if (isMissingFile(error)) {
      logger.error({ configPath }, `config file '${configPath}' not found`);
    } else if (isRouteEngineError(error)) {
      logger.error({ code: error.code }, error.message);
    } else {
      logger.error({ err: error }, error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}
