import { type Classifier, inComment, inString, sameStyle } from './classifier';
import { logDebug } from './config';
import type { MatchContext, Tag } from './rule';

const openingBrackets: string[] = ['(', '[', '{'];
const closingBrackets: string[] = [')', ']', '}'];
const counterparts = new Map<string, string>([
	['(', ')'], [')', '('],
	['[', ']'], [']', '['],
	['{', '}'], ['}', '{'],
]);
export const quoteCharacters: string[] = ['"', "'", '`'];

/** A bracket or quote the scanner can start from. */
export interface DelimiterTag extends Tag {
	/** Offset of the delimiter character. */
	readonly offset: number;
	readonly forward: boolean;
}

/** Delimiter matching is unreliable at this column of the line for the configured languages. */
export function isLineEndGuarded(ctx: MatchContext, offset: number): boolean {
	const { config, document } = ctx;
	return config.lineEndGuardLanguages.includes(document.languageId) &&
		offset === document.lineEnd(offset) - config.lineEndGuardOffset;
}

/** Direction to scan from the delimiter at `offset`, or `undefined` when it is not a matchable delimiter. */
function scanDirection(ctx: MatchContext, offset: number): boolean | undefined {
	const ch = ctx.document.charAt(offset);
	if (openingBrackets.includes(ch)) { return true; }
	if (closingBrackets.includes(ch)) { return false; }
	if (quoteCharacters.includes(ch) && inString(ctx.classifier, offset)) {
		// An opening quote shares its style with the string content that follows it.
		return sameStyle(ctx.classifier.classify(offset), ctx.classifier.classify(offset + 1));
	}
	return undefined;
}

export function delimiterTagAt(ctx: MatchContext, offset: number): DelimiterTag | undefined {
	if (isLineEndGuarded(ctx, offset)) {
		logDebug(ctx.config, `line-end guard at ${offset}`);
		return undefined;
	}
	const forward = scanDirection(ctx, offset);
	if (forward === undefined) { return undefined; }
	// Selections from a closing delimiter include it.
	return { start: forward ? offset : offset + 1, offset, forward };
}

/** Walks over positions satisfying `within` only, tracking the nesting level of the starting bracket. */
function walkWithin(
	ctx: MatchContext, offset: number, forward: boolean,
	within: (classifier: Classifier, pos: number) => boolean
): number | undefined {
	const { document, classifier } = ctx;
	const bracket = document.charAt(offset);
	const counterpart = counterparts.get(bracket);
	const delta = forward ? 1 : -1;
	const limit = forward ? document.length - 1 : 0;
	let level = 1;
	let pos = offset;
	while (pos !== limit && level > 0) {
		pos += delta;
		if (within(classifier, pos)) {
			const ch = document.charAt(pos);
			if (ch === bracket) {
				++level;
			} else if (ch === counterpart) {
				--level;
			}
		}
	}
	if (level > 0) { return undefined; }
	return forward ? pos + 1 : pos;
}

/** Balanced scan over code, skipping comments and strings. Fails on a mismatched bracket. */
function scanBalanced(ctx: MatchContext, offset: number, forward: boolean): number | undefined {
	const { document, classifier } = ctx;
	const delta = forward ? 1 : -1;
	const entering = forward ? openingBrackets : closingBrackets;
	const leaving = forward ? closingBrackets : openingBrackets;
	const expected: string[] = [];
	for (let pos = offset; pos >= 0 && pos < document.length; pos += delta) {
		if (inComment(classifier, pos) || inString(classifier, pos)) { continue; }
		const ch = document.charAt(pos);
		if (entering.includes(ch)) {
			const counterpart = counterparts.get(ch);
			if (counterpart) { expected.push(counterpart); }
		} else if (leaving.includes(ch)) {
			if (expected.pop() !== ch) { return undefined; }
			if (expected.length === 0) { return forward ? pos + 1 : pos; }
		}
	}
	return undefined;
}

/** Finds the other end of the string literal whose quote is at `offset`. */
function findOtherQuote(ctx: MatchContext, offset: number, forward: boolean): number | undefined {
	const { document, classifier } = ctx;
	const quote = document.charAt(offset);
	const style = classifier.classify(offset);
	const delta = forward ? 1 : -1;
	for (let pos = offset + delta; pos >= -1 && pos <= document.length; pos += delta) {
		if (!sameStyle(style, classifier.classify(pos))) {
			// A literal cut short by a line break has no closing quote.
			if (document.charAt(pos - delta) !== quote) { return undefined; }
			return forward ? pos : pos + 1;
		}
	}
	return undefined;
}

/** Raw match: one past the counterpart when scanning forward, on it when scanning backward. */
export function scanDelimiter(ctx: MatchContext, tag: DelimiterTag): number | undefined {
	const { classifier } = ctx;
	if (quoteCharacters.includes(ctx.document.charAt(tag.offset))) {
		return findOtherQuote(ctx, tag.offset, tag.forward);
	}
	if (inComment(classifier, tag.offset)) {
		return walkWithin(ctx, tag.offset, tag.forward, inComment);
	}
	if (inString(classifier, tag.offset)) {
		return walkWithin(ctx, tag.offset, tag.forward, inString);
	}
	return scanBalanced(ctx, tag.offset, tag.forward);
}

/** When placing the cursor, a forward match rests on the counterpart rather than past it. */
export function adjustJumpedPosition(raw: number, forward: boolean, selecting: boolean): number {
	return forward && !selecting ? raw - 1 : raw;
}

/** Jumps from the delimiter described by `tag`, moving the cursor on success. */
export function jumpFromDelimiter(ctx: MatchContext, tag: DelimiterTag): number | undefined {
	const raw = scanDelimiter(ctx, tag);
	if (raw === undefined) {
		logDebug(ctx.config, `no match for delimiter at ${tag.offset}`);
		return undefined;
	}
	const destination = adjustJumpedPosition(raw, tag.forward, ctx.selecting);
	ctx.cursor.position = destination;
	return destination;
}

/** The built-in matcher: jumps between brackets and quotes under the cursor. */
export function simpleJump(ctx: MatchContext): number | undefined {
	const tag = delimiterTagAt(ctx, ctx.cursor.position);
	return tag ? jumpFromDelimiter(ctx, tag) : undefined;
}
