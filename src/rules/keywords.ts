import { inComment, inString } from '../classifier';
import { firstNonBlank, nextLineStart } from '../document';
import type { MatchContext, Rule, Tag } from '../rule';

/** Patterns are tested against a line with its indentation stripped. */
export interface KeywordBlock {
	open: RegExp;
	middle?: RegExp;
	close: RegExp;
	/** An opening line that also matches this closes its block on the same line and is skipped. */
	inlineClose?: RegExp;
}

export type KeywordRole = 'open' | 'middle' | 'close';

export interface LineKeyword {
	block: number;
	role: KeywordRole;
}

export interface KeywordTag extends Tag, LineKeyword {
	/** Offset of the keyword: the first non-blank character of its line. */
	readonly keyword: number;
}

export const shellBlocks: KeywordBlock[] = [
	{ open: /^if\b/, middle: /^(elif|else)\b/, close: /^fi\b/, inlineClose: /[\s;]fi\s*(;|$)/ },
	{ open: /^case\b/, close: /^esac\b/, inlineClose: /[\s;]esac\s*(;|$)/ },
	{ open: /^(for|while|until|select)\b/, middle: /^do\b/, close: /^done\b/, inlineClose: /[\s;]done\s*(;|$)/ },
];

export const luaBlocks: KeywordBlock[] = [
	{
		// Anonymous functions open a block wherever they appear on the line.
		open: /^((local\s+)?function|if|for|while|do)\b|\bfunction\s*\(/,
		middle: /^(elseif|else)\b/,
		close: /^end\b/,
		inlineClose: /\bend\s*[),;]*\s*$/,
	},
	{ open: /^repeat\b/, close: /^until\b/ },
];

export const rubyBlocks: KeywordBlock[] = [
	{
		open: /^(def|class|module|if|unless|while|until|case|begin|for)\b|\bdo(\s*\|[^|]*\|)?\s*$/,
		middle: /^(elsif|else|when|in|rescue|ensure)\b/,
		close: /^end\b/,
		inlineClose: /\bend\s*$/,
	},
];

/** Line-oriented block keywords such as `if`/`else`/`fi`. The cursor may be anywhere on a keyword line. */
export class KeywordRule implements Rule<KeywordTag> {
	constructor(readonly name: string, private readonly blocks: readonly KeywordBlock[]) { }

	private keywordOfLine(ctx: MatchContext, lineStart: number): LineKeyword | undefined {
		const doc = ctx.document;
		const first = firstNonBlank(doc, lineStart);
		const end = doc.lineEnd(lineStart);
		if (first === end || inComment(ctx.classifier, first) || inString(ctx.classifier, first)) {
			return undefined;
		}
		const text = doc.getText(first, end);
		for (let block = 0; block < this.blocks.length; ++block) {
			const { open, middle, close, inlineClose } = this.blocks[block];
			if (close.test(text)) { return { block, role: 'close' }; }
			if (middle && middle.test(text)) { return { block, role: 'middle' }; }
			if (open.test(text) && !(inlineClose && inlineClose.test(text))) { return { block, role: 'open' }; }
		}
		return undefined;
	}

	private tagAtLine(ctx: MatchContext, offset: number): KeywordTag | undefined {
		const doc = ctx.document;
		const lineStart = doc.lineStart(offset);
		const keyword = this.keywordOfLine(ctx, lineStart);
		if (!keyword) { return undefined; }
		const keywordOffset = firstNonBlank(doc, lineStart);
		const start = keyword.role === 'close' ? doc.lineEnd(lineStart) : keywordOffset;
		return { ...keyword, start, keyword: keywordOffset };
	}

	getTag(ctx: MatchContext): KeywordTag | undefined {
		return this.tagAtLine(ctx, ctx.cursor.position);
	}

	/** Line start of the keyword matching `tag`: the next middle/close of the block, or the opening line.
	 * Selections span the whole block, so middles are passed over while selecting.
	 */
	private counterpartLine(ctx: MatchContext, tag: KeywordTag): number | undefined {
		const doc = ctx.document;
		const forward = tag.role !== 'close';
		let depth = 0;
		let line = doc.lineStart(tag.keyword);
		for (;;) {
			if (forward) {
				line = nextLineStart(doc, line);
				if (line >= doc.length) { return undefined; }
			} else {
				if (line === 0) { return undefined; }
				line = doc.lineStart(line - 1);
			}
			const keyword = this.keywordOfLine(ctx, line);
			if (!keyword || keyword.block !== tag.block) { continue; }
			if (keyword.role === (forward ? 'open' : 'close')) {
				++depth;
			} else if (keyword.role === 'middle') {
				if (forward && depth === 0 && !ctx.selecting) { return line; }
			} else if (depth === 0) {
				return line;
			} else {
				--depth;
			}
		}
	}

	jump(ctx: MatchContext, tag: KeywordTag, count: number): number | undefined {
		const doc = ctx.document;
		let current: KeywordTag | undefined = tag;
		let destination: number | undefined;
		for (let i = 0; i < count && current; ++i) {
			const line = this.counterpartLine(ctx, current);
			if (line === undefined) { break; }
			current = this.tagAtLine(ctx, line);
			destination = firstNonBlank(doc, line);
		}
		if (destination === undefined) { return undefined; }
		if (ctx.selecting && current && current.role === 'close' && destination > tag.keyword) {
			// Selections extend over the whole closing line.
			destination = doc.lineEnd(destination);
		}
		ctx.cursor.position = destination;
		return destination;
	}
}
