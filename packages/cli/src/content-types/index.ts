/**
 * Content Types Module
 *
 * Node.js content-type database backing the ContentTypeSource interface.
 */

export {
  ContentTypeDatabase,
  createContentTypeDatabase,
} from './database.js';

export type { ContentTypeDatabaseOptions } from './database.js';

export {
  ContentTypeRulesSchema,
  MagicRuleSchema,
  loadBundledRules,
} from './rules.js';

export type {
  ContentTypeRules,
  ContentTypeRulesInput,
  MagicRule,
} from './rules.js';

export {
  sniffContent,
  shebangInterpreter,
  SNIFF_LENGTH,
  OCTET_STREAM,
  TEXT_PLAIN,
  ZERO_SIZE,
} from './sniff.js';
