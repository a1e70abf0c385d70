import type { Direction, TerrainKind } from '@wayfarer/protocol';
import { DIRECTIONS, OPPOSITE_DIRECTIONS, TERRAIN_KINDS } from '@wayfarer/protocol';
import {
  TerrainRulesetSchema,
  loadDefaultRuleset,
  type TerrainRule,
  type TerrainRuleset,
  type ThemeBias,
} from './ruleset.js';

type DirectionMasks = Record<Direction, number[]>;

/**
 * Adjacency and weight rules between terrain kinds.
 *
 * Kinds are indexed in the order of TERRAIN_KINDS so a domain can be held
 * as a bitmask. supportMask(i, d) is the set of kinds that may sit in
 * direction d of kind i; allow() always records the reverse pairing too,
 * so compatible(a, b, north) === compatible(b, a, south).
 */
export class TileCompatibilityModel {
  readonly version: number;
  readonly fallbackKind: TerrainKind;
  readonly notes: string | undefined;

  private kinds: TerrainKind[];
  private indexByKind: Map<TerrainKind, number> = new Map();
  private rules: Map<TerrainKind, TerrainRule> = new Map();
  private weights: number[];
  private masks: DirectionMasks;
  private themes: Map<string, ThemeBias>;

  private constructor(ruleset: TerrainRuleset) {
    this.version = ruleset.version;
    this.fallbackKind = ruleset.fallbackKind;
    this.notes = ruleset.notes;
    this.themes = new Map(Object.entries(ruleset.themes ?? {}));

    this.kinds = TERRAIN_KINDS.filter((kind) => ruleset.kinds[kind] !== undefined);
    this.weights = [];
    this.kinds.forEach((kind, index) => {
      const rule = ruleset.kinds[kind];
      if (!rule) return;
      this.indexByKind.set(kind, index);
      this.rules.set(kind, rule);
      this.weights.push(rule.weight);
    });

    this.masks = {
      north: this.kinds.map(() => 0),
      east: this.kinds.map(() => 0),
      south: this.kinds.map(() => 0),
      west: this.kinds.map(() => 0),
    };

    for (const kind of this.kinds) {
      for (const neighbor of this.rules.get(kind)?.neighbors ?? []) {
        for (const direction of DIRECTIONS) {
          this.allow(kind, neighbor, direction);
        }
      }
    }

    for (const rule of ruleset.directional ?? []) {
      this.allow(rule.kind, rule.neighbor, rule.direction);
    }
  }

  /**
   * Build a model from raw ruleset data (validated)
   */
  static fromRuleset(input: unknown): TileCompatibilityModel {
    return new TileCompatibilityModel(TerrainRulesetSchema.parse(input));
  }

  /**
   * Model for the bundled terrain-rules.json
   */
  static fromDefaultRuleset(): TileCompatibilityModel {
    return new TileCompatibilityModel(loadDefaultRuleset());
  }

  private allow(kind: TerrainKind, neighbor: TerrainKind, direction: Direction): void {
    const a = this.indexOf(kind);
    const b = this.indexOf(neighbor);
    const forward = this.masks[direction];
    const reverse = this.masks[OPPOSITE_DIRECTIONS[direction]];
    forward[a] = (forward[a] ?? 0) | (1 << b);
    reverse[b] = (reverse[b] ?? 0) | (1 << a);
  }

  /**
   * Can `b` sit in `direction` of `a`?
   */
  compatible(a: TerrainKind, b: TerrainKind, direction: Direction): boolean {
    return (this.supportMask(this.indexOf(a), direction) & (1 << this.indexOf(b))) !== 0;
  }

  weight(kind: TerrainKind): number {
    return this.weights[this.indexOf(kind)] ?? 0;
  }

  getKinds(): readonly TerrainKind[] {
    return this.kinds;
  }

  hasKind(kind: TerrainKind): boolean {
    return this.indexByKind.has(kind);
  }

  indexOf(kind: TerrainKind): number {
    const index = this.indexByKind.get(kind);
    if (index === undefined) {
      throw new Error(`Unknown terrain kind '${kind}' for ruleset v${this.version}`);
    }
    return index;
  }

  kindAt(index: number): TerrainKind {
    const kind = this.kinds[index];
    if (kind === undefined) {
      throw new Error(`Terrain index ${index} out of range`);
    }
    return kind;
  }

  weightAt(index: number): number {
    return this.weights[index] ?? 0;
  }

  /**
   * Per-index weights with a region theme's multipliers applied.
   * An unknown theme gives the base weights.
   */
  weightsFor(theme: string): number[] {
    const bias = this.themes.get(theme);
    return this.kinds.map((kind, index) => (this.weights[index] ?? 0) * (bias?.[kind] ?? 1));
  }

  hasTheme(theme: string): boolean {
    return this.themes.has(theme);
  }

  getThemes(): string[] {
    return Array.from(this.themes.keys());
  }

  /**
   * Domain containing every kind
   */
  fullMask(): number {
    return (1 << this.kinds.length) - 1;
  }

  maskOf(kind: TerrainKind): number {
    return 1 << this.indexOf(kind);
  }

  supportMask(index: number, direction: Direction): number {
    return this.masks[direction][index] ?? 0;
  }

  isPassable(kind: TerrainKind): boolean {
    return this.ruleFor(kind).passable;
  }

  categoryOf(kind: TerrainKind): string {
    return this.ruleFor(kind).category;
  }

  locationTypesFor(kind: TerrainKind): readonly string[] {
    return this.ruleFor(kind).locationTypes;
  }

  private ruleFor(kind: TerrainKind): TerrainRule {
    const rule = this.rules.get(kind);
    if (!rule) {
      throw new Error(`Unknown terrain kind '${kind}' for ruleset v${this.version}`);
    }
    return rule;
  }
}
