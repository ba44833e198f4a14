import { randomUUID } from "node:crypto";
import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { DeliveryPlan, OptimizedRoute } from "@gridroute/domain";
import { renderRouteHtml, renderRouteSvg } from "@gridroute/render";
import {
  buildGridFromPlan,
  createDefaultStrategyRegistry,
  isRouteEngineError,
  parseDeliveryConfig,
  RouteOptimizer,
  UnknownStrategyError,
  type GridNetwork,
  type RouteEngineError,
  type StrategyRegistry
} from "@gridroute/route-engine";
import { getConfig } from "./config.js";

export type StoredRoute = OptimizedRoute & {
  id: string;
  strategy: string;
  createdAtIso: string;
};

type RouteRecord = {
  route: StoredRoute;
  grid: GridNetwork;
  plan: DeliveryPlan;
};

type ServerOptions = {
  logger?: FastifyServerOptions["logger"];
  registry?: StrategyRegistry;
};

function resolveLogger(optionsLogger?: FastifyServerOptions["logger"]) {
  if (optionsLogger !== undefined) {
    return optionsLogger;
  }

  if (process.env.NODE_ENV === "test") {
    return { level: "silent" };
  }

  return { level: getConfig().LOG_LEVEL };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function statusForError(error: RouteEngineError) {
  switch (error.code) {
    case "UNMAPPED_POI":
    case "UNREACHABLE":
      return 422;
    default:
      return 400;
  }
}

function errorPayload(error: RouteEngineError) {
  if (error instanceof UnknownStrategyError) {
    return { error: error.message, code: error.code, validStrategies: error.validStrategies };
  }
  return { error: error.message, code: error.code };
}

export function buildServer(options: ServerOptions = {}): FastifyInstance {
  const app = Fastify({ logger: resolveLogger(options.logger) });
  const config = getConfig();
  const registry = options.registry ?? createDefaultStrategyRegistry();
  const routeStore = new Map<string, RouteRecord>();

  void app.register(cors, { origin: true });

  app.get("/health", async () => {
    return { status: "ok" };
  });

  app.get("/", async () => {
    return {
      service: "gridroute-api",
      message: "Grid route optimizer is running."
    };
  });

  app.get("/strategies", async () => {
    return { strategies: registry.names() };
  });

  app.post("/routes/optimize", async (request, reply) => {
    // Server defaults apply only where the request leaves a field out.
    const body = isRecord(request.body)
      ? {
          strategy: config.DEFAULT_STRATEGY,
          max_iterations: config.MAX_ITERATIONS,
          ...request.body
        }
      : request.body;

    let record: RouteRecord;
    try {
      const plan = parseDeliveryConfig(body);
      const grid = buildGridFromPlan(plan);
      const optimizer = new RouteOptimizer(grid, {
        registry,
        logger: request.log,
        maxIterations: plan.maxIterations
      });
      const route = optimizer.optimize(plan.startPoi, plan.deliveryAddresses, plan.strategy);
      record = {
        route: {
          ...route,
          id: `route-${randomUUID()}`,
          strategy: plan.strategy,
          createdAtIso: new Date().toISOString()
        },
        grid,
        plan
      };
    } catch (error) {
      if (isRouteEngineError(error)) {
        request.log.warn({ code: error.code }, error.message);
        reply.status(statusForError(error));
        return errorPayload(error);
      }
      request.log.error({ err: error }, "route optimization failed");
      reply.status(500);
      return {
        error: error instanceof Error ? error.message : "Route optimization failed."
      };
    }

    routeStore.set(record.route.id, record);
    request.log.info(
      {
        routeId: record.route.id,
        strategy: record.route.strategy,
        stops: record.route.path.length,
        totalDistance: record.route.totalDistance
      },
      "route optimized"
    );
    return record.route;
  });

  app.get<{ Params: { id: string } }>("/routes/:id", async (request, reply) => {
    const record = routeStore.get(request.params.id);
    if (!record) {
      reply.status(404);
      return { error: "Route not found" };
    }
    return record.route;
  });

  app.get<{ Params: { id: string } }>("/routes/:id/map.svg", async (request, reply) => {
    const record = routeStore.get(request.params.id);
    if (!record) {
      reply.status(404);
      return { error: "Route not found" };
    }

    reply.header("Content-Type", "image/svg+xml");
    return renderRouteSvg(record.grid, record.route, { nodes: record.plan.nodes });
  });

  app.get<{ Params: { id: string } }>("/routes/:id/map.html", async (request, reply) => {
    const record = routeStore.get(request.params.id);
    if (!record) {
      reply.status(404);
      return { error: "Route not found" };
    }

    reply.header("Content-Type", "text/html; charset=utf-8");
    return renderRouteHtml(record.grid, record.route, { nodes: record.plan.nodes });
  });

  return app;
}
