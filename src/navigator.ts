import { logDebug } from './config';
import type { MatchContext, Rule, Tag } from './rule';
import { delimiterTagAt, jumpFromDelimiter } from './scanner';

/** Called with the tag about to be jumped from, before the cursor moves. */
export type BeforeJump = (tag: Tag) => void;

function forcesSimpleJump(ctx: MatchContext): boolean {
	return ctx.config.alwaysSimpleJump || ctx.config.simpleJumpLanguages.includes(ctx.document.languageId);
}

function tagFromRule(ctx: MatchContext, rule: Rule): Tag | undefined {
	try {
		return rule.getTag(ctx);
	} catch (err) {
		console.error(`matching-items: rule "${rule.name}" failed to inspect position ${ctx.cursor.position}:`, err);
		return undefined;
	}
}

/** Jumps `count` times from the item under the cursor and returns the destination.
 * The first rule of the document's grammar reporting a tag wins; when none does,
 * the built-in delimiter scanner gets a second chance.
 */
export function operateOnItem(ctx: MatchContext, count: number = 1, beforeJump?: BeforeJump): number | undefined {
	const times = Math.max(1, Math.floor(count));
	const rules = forcesSimpleJump(ctx) ? [] : ctx.rules.lookup(ctx.document.languageId);
	let jumped = false;
	let destination: number | undefined;
	for (const rule of rules) {
		const tag = tagFromRule(ctx, rule);
		if (tag && !jumped) {
			if (beforeJump) { beforeJump(tag); }
			destination = rule.jump(ctx, tag, times);
			jumped = true;
			logDebug(ctx.config, `rule "${rule.name}" jumped from ${tag.start} to ${destination}`);
		}
	}
	if (!jumped) {
		const tag = delimiterTagAt(ctx, ctx.cursor.position);
		if (beforeJump) { beforeJump(tag ?? { start: ctx.cursor.position }); }
		destination = tag ? jumpFromDelimiter(ctx, tag) : undefined;
	}
	return destination;
}
