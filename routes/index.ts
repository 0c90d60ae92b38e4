import { RequestHandler, Router } from "express";
import { createAdminController } from "../controllers/admin";
import { ReleaseValue, createStrategyController } from "../controllers/strategy";
import { createAdminGuard } from "../middlewares/isAdmin";
import { EventLogService } from "../services/event-log.service";
import { IVaultAdapter } from "../services/vault-adapter";
import { YieldStrategyService } from "../services/yield-strategy.service";
import { createAdminRoutes } from "./admin.routes";
import { createStrategyRoutes } from "./strategy.routes";

export interface RouteDeps {
  strategy: YieldStrategyService;
  vault: IVaultAdapter;
  eventLog: EventLogService;
  release: ReleaseValue;
  authenticate: RequestHandler;
}

export const createAppRoutes = (deps: RouteDeps) => {
  const appRoutes = Router();

  appRoutes.use("/strategy", createStrategyRoutes(createStrategyController(deps.strategy, deps.release), deps.authenticate));
  appRoutes.use(
    "/admin",
    createAdminRoutes(createAdminController(deps.strategy, deps.eventLog), [deps.authenticate, createAdminGuard(deps.vault)])
  );

  return appRoutes;
};
