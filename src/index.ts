export { titleCase, createTitleCaser, classifyTokens, reassemble } from './title-case';
export { tokenize, findWordTokenIndex } from './utils/tokenizer';
export { classifyToken, classificationRules, isOrdinalLike } from './utils/classifier';
export { applyPhrasalFixups, lowercasePhrases, capitalizeBoundaryWords } from './utils/fixup';
export {
	createLexicon,
	loadLexiconFile,
	defaultLexicon,
	defaultLexiconSource,
	LexiconError,
} from './utils/lexicon';
export type { LexiconOverrides } from './utils/lexicon';
export { title, titleCaseValue } from './utils/filters/title';
export * from './types/types';
