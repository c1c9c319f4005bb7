import { RuleRegistry } from '../registry';
import { KeywordRule, luaBlocks, rubyBlocks, shellBlocks } from './keywords';
import { simpleRule } from './simple';

/** Languages whose structure is carried by brackets and quotes alone. */
export const bracketLanguages: string[] = [
	'c', 'cpp', 'csharp', 'objective-c', 'java', 'kotlin', 'scala', 'groovy', 'dart', 'swift',
	'javascript', 'javascriptreact', 'typescript', 'typescriptreact', 'go', 'rust', 'php', 'perl',
	'python', 'json', 'jsonc', 'css', 'scss', 'less', 'lisp', 'scheme', 'clojure', 'sql', 'latex',
	'cmake', 'yaml', 'html', 'xml',
];

/** Grammar rules in priority order: keyword blocks before plain brackets. */
export function createDefaultRegistry(): RuleRegistry {
	return new RuleRegistry()
		.registerAll(bracketLanguages, [simpleRule])
		.register('shellscript', [new KeywordRule('shell', shellBlocks), simpleRule])
		.register('lua', [new KeywordRule('lua', luaBlocks), simpleRule])
		.register('ruby', [new KeywordRule('ruby', rubyBlocks), simpleRule]);
}
