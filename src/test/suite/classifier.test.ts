import * as assert from 'assert';

import { inComment, inString, LexicalClassifier, sameStyle, syntaxFor } from '../../classifier';

suite('Lexical classifier', () => {
	test('line comments run to the end of the line', () => {
		const classifier = LexicalClassifier.forLanguage('a // (b)\nc', 'typescript');
		assert.deepStrictEqual([...classifier.classify(2)], ['comment', 'comment-delimiter']);
		assert.deepStrictEqual([...classifier.classify(5)], ['comment']);
		assert.strictEqual(inComment(classifier, 8), false);
		assert.strictEqual(classifier.classify(9).size, 0);
	});

	test('block comments mark both delimiters', () => {
		const classifier = LexicalClassifier.forLanguage('/* ( */ (', 'typescript');
		assert.ok(classifier.classify(1).has('comment-delimiter'));
		assert.deepStrictEqual([...classifier.classify(3)], ['comment']);
		assert.ok(classifier.classify(6).has('comment-delimiter'));
		assert.strictEqual(inComment(classifier, 8), false);
	});

	test('strings include their quotes and escaped quotes', () => {
		const classifier = LexicalClassifier.forLanguage('x = "a\\"b";', 'typescript');
		assert.strictEqual(inString(classifier, 3), false);
		assert.strictEqual(inString(classifier, 4), true);
		assert.strictEqual(inString(classifier, 7), true);
		assert.strictEqual(inString(classifier, 9), true);
		assert.strictEqual(inString(classifier, 10), false);
	});

	test('unterminated strings run to the end of the text', () => {
		const classifier = LexicalClassifier.forLanguage("x 'abc", 'python');
		assert.strictEqual(inString(classifier, 1), false);
		assert.strictEqual(inString(classifier, 5), true);
	});

	test('quoted strings end at a line break, template strings do not', () => {
		const quoted = LexicalClassifier.forLanguage("a = 'x\nf(y)", 'typescript');
		assert.strictEqual(inString(quoted, 5), true);
		assert.strictEqual(inString(quoted, 6), false);
		assert.strictEqual(inString(quoted, 8), false);
		const template = LexicalClassifier.forLanguage('a = `x\n(y)`;', 'typescript');
		assert.strictEqual(inString(template, 7), true);
		assert.strictEqual(inString(template, 11), false);
	});

	test('rust lifetimes are code, character literals are strings', () => {
		const lifetimes = LexicalClassifier.forLanguage("fn f<'a>(x: &'a str)", 'rust');
		assert.strictEqual(inString(lifetimes, 5), false);
		assert.strictEqual(inString(lifetimes, 13), false);
		const literal = LexicalClassifier.forLanguage("let c = '(';", 'rust');
		assert.strictEqual(inString(literal, 8), true);
		assert.strictEqual(inString(literal, 9), true);
		assert.strictEqual(inString(literal, 10), true);
		assert.strictEqual(inString(literal, 11), false);
		const escaped = LexicalClassifier.forLanguage("let c = '\\'';", 'rust');
		assert.strictEqual(inString(escaped, 11), true);
		assert.strictEqual(inString(escaped, 12), false);
	});

	test('comment markers inside strings are not comments', () => {
		const classifier = LexicalClassifier.forLanguage('s = "# no"\n# yes', 'python');
		assert.strictEqual(inComment(classifier, 5), false);
		assert.strictEqual(inComment(classifier, 11), true);
	});

	test('lua block comments take precedence over line comments', () => {
		const classifier = LexicalClassifier.forLanguage('--[[ a\nb ]] c', 'lua');
		assert.strictEqual(inComment(classifier, 7), true);
		assert.strictEqual(inComment(classifier, 12), false);
	});

	test('positions outside the document have no style', () => {
		const classifier = LexicalClassifier.forLanguage('"a"', 'typescript');
		assert.strictEqual(classifier.classify(-1).size, 0);
		assert.strictEqual(classifier.classify(3).size, 0);
	});

	test('language syntaxes', () => {
		assert.deepStrictEqual(syntaxFor('python').lineComments, ['#']);
		assert.deepStrictEqual(syntaxFor('lisp').lineComments, [';']);
		assert.deepStrictEqual(syntaxFor('no-such-language').lineComments, ['//']);
	});

	test('style comparison', () => {
		const classifier = LexicalClassifier.forLanguage('a /* b */ "c"', 'typescript');
		assert.strictEqual(sameStyle(classifier.classify(2), classifier.classify(3)), true);
		assert.strictEqual(sameStyle(classifier.classify(2), classifier.classify(5)), false);
		assert.strictEqual(sameStyle(classifier.classify(0), classifier.classify(1)), true);
		assert.strictEqual(sameStyle(classifier.classify(10), classifier.classify(5)), false);
	});
});
