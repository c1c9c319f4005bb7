/** Read-only view of a document's linear text, as seen by the matching engine. */
export interface DocumentView {
	/** Grammar identifier used to look up rules, e.g. `typescript` or `shellscript`. */
	readonly languageId: string;
	readonly length: number;
	/** Character at `offset`, or the empty string outside the document. */
	charAt(offset: number): string;
	/** Offset of the first character of the line containing `offset`. */
	lineStart(offset: number): number;
	/** Offset of the line break (or document end) terminating the line containing `offset`. */
	lineEnd(offset: number): number;
	getText(begin?: number, end?: number): string;
}

export interface Cursor {
	position: number;
}

export class SimpleCursor implements Cursor {
	constructor(public position: number = 0) { }
}

function isBlank(ch: string): boolean {
	return ch === ' ' || ch === '\t';
}

/** In-memory document with a line index. Lines are separated by `\n`. */
export class TextDocumentModel implements DocumentView {
	private readonly lineStarts: number[] = [0];

	constructor(private readonly text: string, readonly languageId: string = 'plaintext') {
		for (let i = 0; i < text.length; ++i) {
			if (text[i] === '\n') { this.lineStarts.push(i + 1); }
		}
	}

	get length(): number {
		return this.text.length;
	}

	charAt(offset: number): string {
		if (offset < 0 || offset >= this.text.length) { return ''; }
		return this.text[offset];
	}

	/** Zero-based line number of `offset`, clamped into the document. */
	lineAt(offset: number): number {
		const clamped = Math.max(0, Math.min(offset, this.text.length));
		let lo = 0;
		let hi = this.lineStarts.length - 1;
		while (lo < hi) {
			const mid = (lo + hi + 1) >> 1;
			if (this.lineStarts[mid] <= clamped) {
				lo = mid;
			} else {
				hi = mid - 1;
			}
		}
		return lo;
	}

	lineStart(offset: number): number {
		return this.lineStarts[this.lineAt(offset)];
	}

	lineEnd(offset: number): number {
		const line = this.lineAt(offset);
		if (line + 1 >= this.lineStarts.length) {
			return this.text.length;
		}
		const newline = this.lineStarts[line + 1] - 1;
		// CRLF documents: the line ends before the carriage return.
		return newline > this.lineStarts[line] && this.text[newline - 1] === '\r' ? newline - 1 : newline;
	}

	getText(begin: number = 0, end: number = this.text.length): string {
		return this.text.slice(begin, end);
	}
}

/** Offset of the first non-blank character on the line of `offset`, or the line end. */
export function firstNonBlank(doc: DocumentView, offset: number): number {
	const end = doc.lineEnd(offset);
	let pos = doc.lineStart(offset);
	while (pos < end && isBlank(doc.charAt(pos))) { ++pos; }
	return pos;
}

/** Offset of the first character of the line after the one containing `offset`, or the document end. */
export function nextLineStart(doc: DocumentView, offset: number): number {
	let pos = doc.lineEnd(offset);
	if (doc.charAt(pos) === '\r') { ++pos; }
	if (doc.charAt(pos) === '\n') { ++pos; }
	return pos;
}

/** Whether only blanks separate `offset` from the start of its line. */
export function onlyBlanksBefore(doc: DocumentView, offset: number): boolean {
	for (let pos = doc.lineStart(offset); pos < offset; ++pos) {
		if (!isBlank(doc.charAt(pos))) { return false; }
	}
	return true;
}
