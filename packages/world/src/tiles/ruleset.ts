import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DIRECTIONS, TERRAIN_KINDS } from '@wayfarer/protocol';

/**
 * Schema for a terrain kind
 */
export const TerrainKindSchema = z.enum(TERRAIN_KINDS);

/**
 * Tuning data for a single terrain kind
 */
export const TerrainRuleSchema = z.object({
  weight: z.number().nonnegative().describe('Relative selection weight'),
  passable: z.boolean(),
  category: z.string().min(1).describe('Location category suggested for this terrain'),
  locationTypes: z.array(z.string().min(1)),
  neighbors: z.array(TerrainKindSchema).describe('Kinds allowed next to this one in every direction'),
});

/**
 * One-way-by-direction rule: `neighbor` may sit `direction` of `kind`.
 * The reverse pairing is implied.
 */
export const DirectionalRuleSchema = z.object({
  kind: TerrainKindSchema,
  neighbor: TerrainKindSchema,
  direction: z.enum(DIRECTIONS),
});

/**
 * Per-kind weight multipliers for a region theme. Kinds left out keep their base weight.
 */
export const ThemeBiasSchema = z.record(TerrainKindSchema, z.number().positive());

/**
 * Versioned terrain ruleset
 */
export const TerrainRulesetSchema = z
  .object({
    version: z.number().int().positive(),
    notes: z.string().optional().describe('What changed in this version'),
    fallbackKind: TerrainKindSchema,
    kinds: z.record(TerrainKindSchema, TerrainRuleSchema),
    directional: z.array(DirectionalRuleSchema).optional(),
    themes: z.record(z.string().min(1), ThemeBiasSchema).optional(),
  })
  .superRefine((ruleset, ctx) => {
    const declared = new Set(Object.keys(ruleset.kinds));
    if (declared.size === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Ruleset declares no terrain kinds' });
    }
    // Bitmask domains in the solver use one bit per kind
    if (declared.size > 30) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Ruleset declares more than 30 terrain kinds' });
    }
    if (!declared.has(ruleset.fallbackKind)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Fallback kind '${ruleset.fallbackKind}' is not declared`,
        path: ['fallbackKind'],
      });
    }
    for (const [kind, rule] of Object.entries(ruleset.kinds)) {
      for (const neighbor of rule?.neighbors ?? []) {
        if (!declared.has(neighbor)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `'${kind}' lists undeclared neighbor '${neighbor}'`,
            path: ['kinds', kind, 'neighbors'],
          });
        }
      }
    }
    for (const rule of ruleset.directional ?? []) {
      if (!declared.has(rule.kind) || !declared.has(rule.neighbor)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Directional rule ${rule.kind} -> ${rule.neighbor} uses an undeclared kind`,
          path: ['directional'],
        });
      }
    }
    for (const [theme, bias] of Object.entries(ruleset.themes ?? {})) {
      for (const kind of Object.keys(bias)) {
        if (!declared.has(kind)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Theme '${theme}' biases undeclared kind '${kind}'`,
            path: ['themes', theme],
          });
        }
      }
    }
  });

export type TerrainRule = z.infer<typeof TerrainRuleSchema>;
export type DirectionalRule = z.infer<typeof DirectionalRuleSchema>;
export type ThemeBias = z.infer<typeof ThemeBiasSchema>;
export type TerrainRuleset = z.infer<typeof TerrainRulesetSchema>;

let cachedRuleset: TerrainRuleset | null = null;

/**
 * Load the bundled terrain ruleset (terrain-rules.json beside this module)
 */
export function loadDefaultRuleset(): TerrainRuleset {
  if (cachedRuleset) return cachedRuleset;

  const here = path.dirname(fileURLToPath(import.meta.url));
  const rulesPath = path.join(here, 'terrain-rules.json');
  const content: unknown = JSON.parse(fs.readFileSync(rulesPath, 'utf-8'));

  cachedRuleset = TerrainRulesetSchema.parse(content);
  return cachedRuleset;
}
