import { logDebug } from './config';
import { operateOnItem } from './navigator';
import { jumpToPercentage } from './percentage';
import { type Region, resolveRegion } from './region';
import type { MatchContext } from './rule';

/** `%`: with a count and percentage jumping enabled, goes to that percentage of the document;
 * otherwise jumps to the matching item, `count` times where the grammar supports it.
 * Returns `undefined` and leaves the cursor in place when nothing matches.
 */
export function jumpItems(ctx: MatchContext, count?: number): number | undefined {
	if (count !== undefined && count > 0 && ctx.config.percentageJump) {
		return jumpToPercentage(ctx, count);
	}
	const origin = ctx.cursor.position;
	const destination = operateOnItem(ctx, count ?? 1);
	if (destination === undefined) {
		logDebug(ctx.config, `no matching item at ${origin}`);
		ctx.cursor.position = origin;
		return undefined;
	}
	ctx.cursor.position = destination;
	return destination;
}

export function selectItems(ctx: MatchContext, count: number = 1, inner: boolean = false): Region | undefined {
	return resolveRegion(ctx, count, inner);
}

/** The region to delete; the cursor goes to where the region began. */
export function deleteItems(ctx: MatchContext, count: number = 1, inner: boolean = false): Region | undefined {
	const region = resolveRegion(ctx, count, inner);
	if (region) { ctx.cursor.position = region.begin; }
	return region;
}
