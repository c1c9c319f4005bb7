import { firstNonBlank } from './document';
import type { MatchContext } from './rule';

/** Above this document size the offset is computed from `size / 100` first. */
export const coarsePercentageThreshold = 80000;

/** Offset at `percent`% of a document of `size` characters, clamped into `[0, size]`. */
export function percentageOffset(size: number, percent: number): number {
	const p = Number.isFinite(percent) ? Math.trunc(percent) : 0;
	const offset = size > coarsePercentageThreshold ?
		p * Math.floor(size / 100) :
		Math.floor(p * size / 100);
	return Math.max(0, Math.min(offset, size));
}

/** Moves the cursor to `percent`% of the document, then to the first non-blank character of that line. */
export function jumpToPercentage(ctx: MatchContext, percent: number): number {
	const target = percentageOffset(ctx.document.length, percent);
	const destination = firstNonBlank(ctx.document, target);
	ctx.cursor.position = destination;
	return destination;
}
