import { TileCompatibilityModel } from '../src/tiles/compatibility.js';

interface RuleOverrides {
  weight?: number;
  passable?: boolean;
}

export function rule(neighbors: string[], overrides: RuleOverrides = {}) {
  return {
    weight: overrides.weight ?? 1,
    passable: overrides.passable ?? true,
    category: 'wilderness',
    locationTypes: [],
    neighbors,
  };
}

/**
 * Three kinds that only sit next to themselves; plains is the fallback
 */
export const STRICT_RULESET = {
  version: 2,
  fallbackKind: 'plains',
  kinds: {
    plains: rule(['plains']),
    water: rule(['water'], { passable: false }),
    mountain: rule(['mountain']),
  },
};

export function strictModel(): TileCompatibilityModel {
  return TileCompatibilityModel.fromRuleset(STRICT_RULESET);
}
