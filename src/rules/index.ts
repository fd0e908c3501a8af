export { RuleEngine, createRuleEngine, applyRules, parseRuleMode, RULE_MODE_KINDS } from './engine.js';
export type { RuleEngineConfig } from './engine.js';
export {
    authorInversion,
    genreCoMembership,
    frequentBorrower,
    authorExpertise,
    preferenceRecommendation,
    loanHistoryRecommendation,
    BASIC_STEPS,
    advancedSteps,
    runPipeline,
} from './library.js';
export type { DerivationStep } from './library.js';
export { applyHeuristicRules, parseHeuristicLine } from './heuristic.js';
export { applyDeclarativeRules, checkRules, fireRule } from './declarative.js';
export { libraryVocabulary } from './vocabulary.js';
export type { LibraryVocabulary } from './vocabulary.js';
export { RuleParser, parseRule, parseRuleBatch, splitRuleLines, parsePrefixDirective, isPrefixDirective } from './parser.js';
