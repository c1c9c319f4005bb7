import type { Classifier } from './classifier';
import type { MatchConfig } from './config';
import type { Cursor, DocumentView } from './document';
import type { RuleRegistry } from './registry';

/** Everything a single navigation call may consult. Lives for the duration of the call. */
export interface MatchContext {
	readonly document: DocumentView;
	readonly classifier: Classifier;
	readonly cursor: Cursor;
	readonly config: MatchConfig;
	readonly rules: RuleRegistry;
	/** True when the result extends a selection (visual mode, text objects), false when it places the cursor. */
	readonly selecting: boolean;
}

/** Match descriptor produced by a rule's `getTag` and consumed only by the same rule's `jump`. */
export interface Tag {
	/** Where a selection anchors when jumping from this tag. */
	readonly start: number;
}

/** Grammar-specific detection and motion for one family of structural pairs. */
export interface Rule<T extends Tag = Tag> {
	readonly name: string;
	/** Recognizes a structural element around the cursor. Must not move the cursor. */
	getTag(ctx: MatchContext): T | undefined;
	/** Moves the cursor to the counterpart of `tag`, `count` times where supported. */
	jump(ctx: MatchContext, tag: T, count: number): number | undefined;
}
