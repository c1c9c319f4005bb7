export type StyleTag = 'comment' | 'comment-delimiter' | 'string';

/** Read-only styling of document positions; the engine consults it to stay out of comments and strings. */
export interface Classifier {
	/** Style tags at `offset`. Positions outside the document have no tags. */
	classify(offset: number): ReadonlySet<StyleTag>;
}

export interface LanguageSyntax {
	lineComments: string[];
	blockComments: [string, string][];
	quotes: string[];
	/** Quotes whose strings may span lines; other strings end at a line break. */
	multilineQuotes: string[];
	escape: string;
	/** Quote that only delimits character literals such as `'x'` or `'\\n'`, and is code otherwise. */
	charQuote?: string;
}

const cLike: LanguageSyntax = {
	lineComments: ['//'], blockComments: [['/*', '*/']], quotes: ['"', "'", '`'], multilineQuotes: ['`'], escape: '\\'
};
const hashComments: LanguageSyntax = {
	lineComments: ['#'], blockComments: [], quotes: ['"', "'"], multilineQuotes: [], escape: '\\'
};
const lispLike: LanguageSyntax = {
	lineComments: [';'], blockComments: [], quotes: ['"'], multilineQuotes: ['"'], escape: '\\'
};

const syntaxes = new Map<string, LanguageSyntax>([
	['python', hashComments],
	['shellscript', { ...hashComments, multilineQuotes: ['"', "'"] }],
	['perl', hashComments],
	['yaml', hashComments],
	['cmake', hashComments],
	['ruby', { ...hashComments, blockComments: [['=begin', '=end']] }],
	['lua', { lineComments: ['--'], blockComments: [['--[[', ']]']], quotes: ['"', "'"], multilineQuotes: [], escape: '\\' }],
	['sql', {
		lineComments: ['--'], blockComments: [['/*', '*/']], quotes: ['"', "'"], multilineQuotes: ['"', "'"], escape: '\\'
	}],
	['rust', {
		lineComments: ['//'], blockComments: [['/*', '*/']], quotes: ['"'], multilineQuotes: ['"'], escape: '\\', charQuote: "'"
	}],
	['lisp', lispLike],
	['scheme', lispLike],
	['clojure', lispLike],
	['latex', { lineComments: ['%'], blockComments: [], quotes: [], multilineQuotes: [], escape: '\\' }],
	['html', { lineComments: [], blockComments: [['<!--', '-->']], quotes: [], multilineQuotes: [], escape: '' }],
	['xml', { lineComments: [], blockComments: [['<!--', '-->']], quotes: [], multilineQuotes: [], escape: '' }],
	['css', { lineComments: [], blockComments: [['/*', '*/']], quotes: ['"', "'"], multilineQuotes: [], escape: '\\' }],
	['json', { lineComments: [], blockComments: [], quotes: ['"'], multilineQuotes: [], escape: '\\' }],
	['jsonc', { lineComments: ['//'], blockComments: [['/*', '*/']], quotes: ['"'], multilineQuotes: [], escape: '\\' }],
]);

/** Comment and string syntax for a language id; unknown languages get C-like syntax. */
export function syntaxFor(languageId: string): LanguageSyntax {
	return syntaxes.get(languageId) ?? cLike;
}

const noTags: ReadonlySet<StyleTag> = new Set<StyleTag>();
const commentTags: ReadonlySet<StyleTag> = new Set<StyleTag>(['comment']);
const commentDelimiterTags: ReadonlySet<StyleTag> = new Set<StyleTag>(['comment', 'comment-delimiter']);
const stringTags: ReadonlySet<StyleTag> = new Set<StyleTag>(['string']);

enum Style {
	code = 0,
	comment = 1,
	commentDelimiter = 2,
	string = 3,
}

const tagsOfStyle: ReadonlySet<StyleTag>[] = [noTags, commentTags, commentDelimiterTags, stringTags];

function startsWithAt(text: string, token: string, offset: number): boolean {
	return token.length > 0 && text.startsWith(token, offset);
}

/** End of the character literal opened at `offset`, or `undefined` when the quote starts a lifetime or label. */
function charLiteralEnd(text: string, offset: number, escape: string): number | undefined {
	const quote = text[offset];
	if (text[offset + 1] === escape) {
		const close = text.indexOf(quote, offset + 3);
		const newline = text.indexOf('\n', offset);
		return close < 0 || (newline >= 0 && newline < close) ? undefined : close + 1;
	}
	return text[offset + 2] === quote && text[offset + 1] !== '\n' ? offset + 3 : undefined;
}

/** Classifies comments and string literals with a single left-to-right pass over the text. */
export class LexicalClassifier implements Classifier {
	private readonly styles: Uint8Array;

	constructor(text: string, syntax: LanguageSyntax) {
		this.styles = new Uint8Array(text.length);
		const n = text.length;
		let i = 0;
		scan: while (i < n) {
			for (const [open, close] of syntax.blockComments) {
				if (startsWithAt(text, open, i)) {
					const bodyStart = i + open.length;
					const closeAt = text.indexOf(close, bodyStart);
					const bodyEnd = closeAt < 0 ? n : closeAt;
					const end = closeAt < 0 ? n : closeAt + close.length;
					this.styles.fill(Style.commentDelimiter, i, bodyStart);
					this.styles.fill(Style.comment, bodyStart, bodyEnd);
					this.styles.fill(Style.commentDelimiter, bodyEnd, end);
					i = end;
					continue scan;
				}
			}
			for (const prefix of syntax.lineComments) {
				if (startsWithAt(text, prefix, i)) {
					const newline = text.indexOf('\n', i);
					const end = newline < 0 ? n : newline;
					this.styles.fill(Style.commentDelimiter, i, i + prefix.length);
					this.styles.fill(Style.comment, i + prefix.length, end);
					i = end;
					continue scan;
				}
			}
			const ch = text[i];
			if (syntax.quotes.includes(ch)) {
				const multiline = syntax.multilineQuotes.includes(ch);
				let j = i + 1;
				while (j < n && text[j] !== ch && (multiline || text[j] !== '\n')) {
					j += text[j] === syntax.escape ? 2 : 1;
				}
				const end = j < n && text[j] === ch ? j + 1 : Math.min(j, n);
				this.styles.fill(Style.string, i, end);
				i = end;
				continue;
			}
			if (ch === syntax.charQuote) {
				const end = charLiteralEnd(text, i, syntax.escape);
				if (end !== undefined) {
					this.styles.fill(Style.string, i, end);
					i = end;
					continue;
				}
			}
			++i;
		}
	}

	static forLanguage(text: string, languageId: string): LexicalClassifier {
		return new LexicalClassifier(text, syntaxFor(languageId));
	}

	classify(offset: number): ReadonlySet<StyleTag> {
		if (offset < 0 || offset >= this.styles.length) { return noTags; }
		return tagsOfStyle[this.styles[offset]];
	}
}

export function inComment(classifier: Classifier, offset: number): boolean {
	return classifier.classify(offset).has('comment');
}

export function inString(classifier: Classifier, offset: number): boolean {
	return classifier.classify(offset).has('string');
}

export function sameStyle(a: ReadonlySet<StyleTag>, b: ReadonlySet<StyleTag>): boolean {
	if (a.size !== b.size) { return false; }
	for (const tag of a) {
		if (!b.has(tag)) { return false; }
	}
	return true;
}
