import type { Stage } from "../stage.js";
import { backendStage, frontendStage, subsStage } from "./app.js";
import { adminUserStage, initialJobsStage, permissionsStage } from "./bootstrap.js";
import { databaseStage } from "./database.js";
import { reverseProxyStage } from "./reverse-proxy.js";
import { cacheStoreStage, databaseServerStage, phpStage, webServerStage } from "./services.js";
import { runtimeToolingStage, sourceCheckoutStage } from "./sources.js";
import { basePackagesStage, swapStage } from "./system.js";
import { cronStage, supervisorStage } from "./supervisor.js";

/** Every stage, in run order. */
export const STAGES: readonly Stage[] = [
  basePackagesStage,
  swapStage,
  phpStage,
  databaseServerStage,
  webServerStage,
  cacheStoreStage,
  sourceCheckoutStage,
  runtimeToolingStage,
  databaseStage,
  backendStage,
  frontendStage,
  subsStage,
  reverseProxyStage,
  supervisorStage,
  cronStage,
  initialJobsStage,
  adminUserStage,
  permissionsStage,
];
