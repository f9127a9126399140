import { Express } from "express";
import type { RouteContext, RouteModule } from "../types/index.js";
import { componentLogger } from "./logger.js";

const logger = componentLogger("Router");

/**
 * Mount route modules in order
 */
export const registerRoutes = (app: Express, context: RouteContext, routes: RouteModule[]): void => {
  for (const route of routes) {
    route.handler(app, context);
    logger.debug({ route: route.id }, "Loaded route module");
  }
};

export default registerRoutes;
