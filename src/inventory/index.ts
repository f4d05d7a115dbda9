export { InventoryBuilder, isInventoryCandidate, PRIMARY_IP_KEY } from './builder.js';
export { InventoryCacheStore, type InventoryCacheOptions } from './cache.js';
export { GroupMap } from './groups.js';
export { InventoryOrchestrator, type InventoryResult, type OrchestratorSettings } from './orchestrator.js';
export {
  META_KEY,
  type HostVars,
  type InventoryDocument,
  type InventoryMeta,
  type InventoryOrigin,
  type InventoryRequest,
  type InventorySource,
} from './types.js';
