/**
 * Barrel export for all Zod schemas.
 */

export {
  DependenciesConfigSchema,
  HostEntrySchema,
  HostGroupSchema,
  InventorySchema,
} from "./inventory";

export {
  BaseParamsSchema,
  CI_USER_NAME_RE,
  DependenciesParamsSchema,
  UserParamsSchema,
} from "./parameters";
