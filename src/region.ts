import { nextLineStart, onlyBlanksBefore } from './document';
import { operateOnItem } from './navigator';
import type { MatchContext } from './rule';

/** Half-open span `[begin, end)` covered by a matched pair. */
export interface Region {
	begin: number;
	end: number;
	/** Whether the delimiters (or the lines holding them) are excluded. */
	inner: boolean;
}

/** Computes the region spanned by the item under the cursor without moving the cursor. */
export function resolveRegion(ctx: MatchContext, count: number, inner: boolean): Region | undefined {
	const selectingCtx: MatchContext = ctx.selecting ? ctx : { ...ctx, selecting: true };
	const origin = ctx.cursor.position;
	const marks: number[] = [];
	const destination = operateOnItem(selectingCtx, count, tag => marks.push(tag.start));
	ctx.cursor.position = origin;
	if (destination === undefined || marks.length === 0) { return undefined; }

	const mark = marks[0];
	let begin = Math.min(mark, destination);
	const end = Math.max(mark, destination);
	const doc = ctx.document;
	if (!inner) {
		if (onlyBlanksBefore(doc, begin)) { begin = doc.lineStart(begin); }
		return { begin, end, inner };
	}
	if (end <= begin || doc.lineStart(begin) === doc.lineStart(end - 1)) {
		// Within one line, drop the delimiter characters themselves.
		const innerBegin = Math.min(begin + 1, end);
		return { begin: innerBegin, end: Math.max(end - 1, innerBegin), inner };
	}
	const innerBegin = nextLineStart(doc, begin);
	let innerEnd = end;
	if (!ctx.config.innerKeepsLastLine.includes(doc.languageId)) {
		const closingLine = doc.lineStart(end - 1);
		innerEnd = doc.lineEnd(closingLine - 1);
	}
	return { begin: innerBegin, end: Math.max(innerEnd, innerBegin), inner };
}
