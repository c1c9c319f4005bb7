import type { TextDocument } from 'vscode';
import { LexicalClassifier } from './classifier';
import type { MatchConfig } from './config';
import { SimpleCursor, TextDocumentModel } from './document';
import type { RuleRegistry } from './registry';
import type { MatchContext } from './rule';

export type SessionDocument = Pick<TextDocument, 'getText' | 'languageId'>;

/** A selection expressed as document offsets. */
export interface OffsetSelection {
	anchor: number;
	active: number;
}

/** Snapshot of an editor for one command. A non-empty selection means the command extends it. */
export function openSession(
	document: SessionDocument, selection: OffsetSelection, config: MatchConfig, rules: RuleRegistry
): MatchContext {
	const text = document.getText();
	const { anchor, active } = selection;
	// The character under a block cursor ending a forward selection is the one before the active end.
	const position = active > anchor ? active - 1 : active;
	return {
		document: new TextDocumentModel(text, document.languageId),
		classifier: LexicalClassifier.forLanguage(text, document.languageId),
		cursor: new SimpleCursor(position),
		config,
		rules,
		selecting: anchor !== active,
	};
}

/** Selection after jumping to `destination`: extended from the old anchor, or collapsed at the destination. */
export function selectionAfterJump(ctx: MatchContext, selection: OffsetSelection, destination: number): OffsetSelection {
	return ctx.selecting ? { anchor: selection.anchor, active: destination } : { anchor: destination, active: destination };
}
