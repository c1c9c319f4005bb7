import { inComment, inString } from '../classifier';
import { type DocumentView, firstNonBlank, nextLineStart } from '../document';
import type { MatchContext, Rule, Tag } from '../rule';
import { type DelimiterTag, delimiterTagAt, isLineEndGuarded, jumpFromDelimiter } from '../scanner';

export interface SimpleTag extends Tag {
	readonly delimiter: DelimiterTag;
}

function lastNonBlank(doc: DocumentView, offset: number): number | undefined {
	const begin = doc.lineStart(offset);
	for (let pos = doc.lineEnd(offset) - 1; pos >= begin; --pos) {
		const ch = doc.charAt(pos);
		if (ch !== ' ' && ch !== '\t') { return pos; }
	}
	return undefined;
}

function isCodeBrace(ctx: MatchContext, offset: number | undefined): offset is number {
	return offset !== undefined && ctx.document.charAt(offset) === '{' &&
		!inComment(ctx.classifier, offset) && !inString(ctx.classifier, offset);
}

/** The `{` opening a block headed by the cursor's line: at the end of that line, or alone on the next one. */
function findBlockBrace(ctx: MatchContext, offset: number): number | undefined {
	const doc = ctx.document;
	const last = lastNonBlank(doc, offset);
	if (last === undefined) { return undefined; }
	if (isCodeBrace(ctx, last)) { return last; }
	const nextLine = nextLineStart(doc, offset);
	if (nextLine >= doc.length) { return undefined; }
	const next = firstNonBlank(doc, nextLine);
	if (isCodeBrace(ctx, next) && lastNonBlank(doc, next) === next) { return next; }
	return undefined;
}

/** Brackets and quotes under the cursor, or the brace opening the block of the current line. */
export const simpleRule: Rule<SimpleTag> = {
	name: 'simple',

	getTag(ctx: MatchContext): SimpleTag | undefined {
		const offset = ctx.cursor.position;
		if (isLineEndGuarded(ctx, offset)) { return undefined; }
		const direct = delimiterTagAt(ctx, offset);
		if (direct) { return { start: direct.start, delimiter: direct }; }
		const brace = findBlockBrace(ctx, offset);
		const delimiter = brace === undefined ? undefined : delimiterTagAt(ctx, brace);
		if (!delimiter) { return undefined; }
		// The selection covers the block's header line too.
		return { start: firstNonBlank(ctx.document, offset), delimiter };
	},

	jump(ctx: MatchContext, tag: SimpleTag): number | undefined {
		return jumpFromDelimiter(ctx, tag.delimiter);
	},
};
