import { LexicalClassifier } from '../classifier';
import { defaultConfig, type MatchConfig } from '../config';
import { SimpleCursor, TextDocumentModel } from '../document';
import type { RuleRegistry } from '../registry';
import type { MatchContext } from '../rule';
import { createDefaultRegistry } from '../rules/defaults';

export interface AnnotatedText {
	content: string;
	/** Offset marked with `@`. */
	source: number;
	/** Offset marked with `^`, if any. */
	target: number | undefined;
}

/** Strips the `@` (cursor) and `^` (expected destination) markers, each placed before the character it marks. */
export function parseAnnotated(annotated: string): AnnotatedText {
	let source = annotated.indexOf('@');
	let target = annotated.indexOf('^');
	if (target >= 0) {
		if (source < target) { --target; } else { --source; }
	}
	const content = annotated.replace('@', '').replace('^', '');
	return { content, source, target: target >= 0 ? target : undefined };
}

export function annotate(content: string, source: number, target: number): string {
	if (source < target) {
		return content.slice(0, source) + '@' + content.slice(source, target) + '^' + content.slice(target);
	}
	return content.slice(0, target) + '^' + content.slice(target, source) + '@' + content.slice(source);
}

export interface ContextOptions {
	config?: Partial<MatchConfig>;
	rules?: RuleRegistry;
	selecting?: boolean;
}

export function contextFor(content: string, language: string, cursor: number, options: ContextOptions = {}): MatchContext {
	return {
		document: new TextDocumentModel(content, language),
		classifier: LexicalClassifier.forLanguage(content, language),
		cursor: new SimpleCursor(cursor),
		config: { ...defaultConfig, ...options.config },
		rules: options.rules ?? createDefaultRegistry(),
		selecting: options.selecting ?? false,
	};
}

/** Parses `annotated` and returns a context with the cursor at `@`. */
export function openWithCursor(annotated: string, language: string, options: ContextOptions = {}): {
	ctx: MatchContext,
	text: AnnotatedText
} {
	const text = parseAnnotated(annotated);
	return { ctx: contextFor(text.content, language, text.source, options), text };
}
