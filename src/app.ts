import express from "express";
import type { Logger } from "./lib/logger";
import { requestId } from "./middleware/requestId";
import { httpLogging } from "./middleware/httpLogging";
import { errorHandler, routeNotFound } from "./middleware/errorHandler";
import type { FoodItemRepository } from "./modules/food-items/repository";
import { createFoodItemService, type FoodItemServiceOptions } from "./modules/food-items/service";
import { foodItemsRouter } from "./modules/food-items/router";

export type AppDeps = {
  foodItems: FoodItemRepository;
  logger: Logger;
  /** Reported by /health. */
  envName?: string;
  service?: FoodItemServiceOptions;
};

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable("x-powered-by");

  // Correlation first so every later failure is logged against the request
  app.use(requestId(deps.logger));
  app.use(httpLogging());
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true, env: deps.envName ?? "dev" }));

  app.use("/v1/fooditems", foodItemsRouter(createFoodItemService(deps.foodItems, deps.service)));

  app.use(routeNotFound());
  app.use(errorHandler());

  return app;
}
