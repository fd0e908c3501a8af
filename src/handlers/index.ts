export { runQueryHandler } from './query.js';
export { applyRulesHandler, checkRulesHandler } from './rules.js';
export { parseArgs } from './schemas.js';
