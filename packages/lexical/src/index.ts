export { LexicalScorer, prepareQuery, compareMatches, score, breakdown } from "./lexical-scorer.js";
export type { PreparedQuery, LexicalCandidate, LexicalMatch } from "./lexical-scorer.js";
export { tokenize, tokenSet, toPhrase } from "./tokenizer.js";
