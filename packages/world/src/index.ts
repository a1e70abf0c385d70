// Random
export { SeededRandom } from './random/seeded-random.js';

// Terrain rules
export { TileCompatibilityModel } from './tiles/compatibility.js';
export {
  TerrainRulesetSchema,
  TerrainKindSchema,
  loadDefaultRuleset,
  type TerrainRule,
  type TerrainRuleset,
  type DirectionalRule,
  type ThemeBias,
} from './tiles/ruleset.js';

// Wave Function Collapse
export {
  WfcSolver,
  type BorderConstraints,
  type SolveRequest,
  type SolveResult,
  type Contradiction,
  type WfcSolverConfig,
} from './wfc/solver.js';

// Chunk system
export { ChunkGenerator, getChunkSeed, type ChunkGeneratorConfig } from './chunk/chunk-generator.js';
export { ChunkManager, type ChunkManagerConfig, type ChunkManagerStats } from './chunk/chunk-manager.js';
export { MemoryChunkStore } from './chunk/memory-chunk-store.js';
export { CHUNK_SIZE } from './chunk/constants.js';

// World graph
export { WorldGrid, type AsymmetricConnection } from './grid/world-grid.js';
export {
  LocationDraftSchema,
  WorldGridSnapshotSchema,
  type WorldGridSnapshot,
} from './grid/location-schema.js';

// Collaborator facade
export { WorldMap, type MapCell } from './map/world-map.js';
