/**
 * Content Type Rules
 *
 * Loads the suffix rules, aliases, subclass hierarchy, interpreter table
 * and magic signatures from data/mime-hierarchy.json.
 *
 * @module content-types/rules
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

export const MagicRuleSchema = z.object({
  offset: z.number().int().nonnegative(),
  /** Hex-encoded signature */
  bytes: z.string().regex(/^(?:[0-9a-f]{2})+$/),
  type: z.string().min(1),
});

export const ContentTypeRulesSchema = z.object({
  /** Filename suffix → type, consulted before mime-types */
  suffixes: z.record(z.string()).default({}),
  /** Alias → canonical type */
  aliases: z.record(z.string()).default({}),
  /** Type → direct parent types */
  subclasses: z.record(z.array(z.string())).default({}),
  /** Interpreter basename (version stripped) → type, for `#!` lines */
  interpreters: z.record(z.string()).default({}),
  magic: z.array(MagicRuleSchema).default([]),
});

export type MagicRule = z.infer<typeof MagicRuleSchema>;
export type ContentTypeRules = z.infer<typeof ContentTypeRulesSchema>;
export type ContentTypeRulesInput = z.input<typeof ContentTypeRulesSchema>;

const RULES_URL = new URL('../../data/mime-hierarchy.json', import.meta.url);

let bundledRules: ContentTypeRules | undefined;

/**
 * Rules shipped with the package. Parsed once per process.
 */
export function loadBundledRules(): ContentTypeRules {
  if (!bundledRules) {
    const content = readFileSync(RULES_URL, 'utf-8');
    bundledRules = ContentTypeRulesSchema.parse(JSON.parse(content));
  }
  return bundledRules;
}
