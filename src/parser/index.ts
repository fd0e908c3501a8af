export { Tokenizer, tokenize } from './tokenizer.js';
export { tokenToTerm, isTermToken, describeToken } from './terms.js';
export type { TermContext } from './terms.js';
