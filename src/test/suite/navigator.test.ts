import * as assert from 'assert';

import { operateOnItem } from '../../navigator';
import { RuleRegistry } from '../../registry';
import type { MatchContext, Rule, Tag } from '../../rule';
import { simpleRule } from '../../rules/simple';
import { contextFor } from '../helpers';

interface Recorded {
	calls: string[];
	counts: number[];
}

function recordingRule(name: string, tag: Tag | undefined, destination: number, recorded: Recorded): Rule {
	return {
		name,
		getTag() {
			recorded.calls.push(`${name}.getTag`);
			return tag;
		},
		jump(ctx: MatchContext, _tag: Tag, count: number) {
			recorded.calls.push(`${name}.jump`);
			recorded.counts.push(count);
			ctx.cursor.position = destination;
			return destination;
		},
	};
}

function failingJumpRule(name: string): Rule {
	return {
		name,
		getTag: () => ({ start: 0 }),
		jump: () => assert.fail(`${name}.jump must not run after another rule jumped`),
	};
}

function silenced<T>(action: () => T): T {
	const original = console.error;
	console.error = () => { };
	try {
		return action();
	} finally {
		console.error = original;
	}
}

suite('Navigation orchestrator', () => {
	test('The first rule reporting a tag wins', () => {
		const recorded: Recorded = { calls: [], counts: [] };
		const rules = new RuleRegistry().register('typescript', [
			recordingRule('none', undefined, 0, recorded),
			recordingRule('first', { start: 1 }, 7, recorded),
			failingJumpRule('second'),
		]);
		const ctx = contextFor('abc def ghi', 'typescript', 1, { rules });
		assert.strictEqual(operateOnItem(ctx), 7);
		assert.strictEqual(ctx.cursor.position, 7);
		assert.deepStrictEqual(recorded.calls, ['none.getTag', 'first.getTag', 'first.jump']);
	});

	test('Later rules are still inspected after a jump', () => {
		const recorded: Recorded = { calls: [], counts: [] };
		const rules = new RuleRegistry().register('typescript', [
			recordingRule('first', { start: 0 }, 3, recorded),
			recordingRule('second', { start: 0 }, 5, recorded),
		]);
		operateOnItem(contextFor('abcdef', 'typescript', 0, { rules }));
		assert.deepStrictEqual(recorded.calls, ['first.getTag', 'first.jump', 'second.getTag']);
	});

	test('The count reaches the rule and is at least one', () => {
		const recorded: Recorded = { calls: [], counts: [] };
		const rules = new RuleRegistry().register('typescript', [recordingRule('r', { start: 0 }, 2, recorded)]);
		operateOnItem(contextFor('abc', 'typescript', 0, { rules }), 3);
		operateOnItem(contextFor('abc', 'typescript', 0, { rules }), 0);
		operateOnItem(contextFor('abc', 'typescript', 0, { rules }));
		assert.deepStrictEqual(recorded.counts, [3, 1, 1]);
	});

	test('The hook sees the winning tag before the cursor moves', () => {
		const recorded: Recorded = { calls: [], counts: [] };
		const rules = new RuleRegistry().register('typescript', [recordingRule('r', { start: 4 }, 9, recorded)]);
		const ctx = contextFor('0123456789', 'typescript', 2, { rules });
		const seen: [number, number][] = [];
		operateOnItem(ctx, 1, tag => seen.push([tag.start, ctx.cursor.position]));
		assert.deepStrictEqual(seen, [[4, 2]]);
	});

	test('Without a tag the delimiter scanner gets a second chance', () => {
		const recorded: Recorded = { calls: [], counts: [] };
		const rules = new RuleRegistry().register('typescript', [recordingRule('none', undefined, 0, recorded)]);
		const ctx = contextFor('(x)', 'typescript', 0, { rules });
		const seen: number[] = [];
		assert.strictEqual(operateOnItem(ctx, 1, tag => seen.push(tag.start)), 2);
		assert.deepStrictEqual(seen, [0]);
		assert.deepStrictEqual(recorded.calls, ['none.getTag']);
	});

	test('Fallback from a closer marks after it', () => {
		const ctx = contextFor('(x)', 'plaintext', 2, { rules: new RuleRegistry() });
		const seen: number[] = [];
		assert.strictEqual(operateOnItem(ctx, 1, tag => seen.push(tag.start)), 0);
		assert.deepStrictEqual(seen, [3]);
	});

	test('Fallback without a delimiter marks the cursor and fails', () => {
		const ctx = contextFor('abc', 'plaintext', 1, { rules: new RuleRegistry() });
		const seen: number[] = [];
		assert.strictEqual(operateOnItem(ctx, 1, tag => seen.push(tag.start)), undefined);
		assert.deepStrictEqual(seen, [1]);
	});

	test('A rule that throws is skipped', () => {
		const rules = new RuleRegistry().register('typescript', [{
			name: 'broken',
			getTag: () => { throw new Error('broken rule'); },
			jump: () => undefined,
		}]);
		const ctx = contextFor('[a]', 'typescript', 0, { rules });
		assert.strictEqual(silenced(() => operateOnItem(ctx)), 2);
	});

	test('Forced simple jumping bypasses the rules', () => {
		const recorded: Recorded = { calls: [], counts: [] };
		const rules = new RuleRegistry().register('typescript', [recordingRule('r', { start: 0 }, 2, recorded)]);
		const always = contextFor('{x}', 'typescript', 0, { rules, config: { alwaysSimpleJump: true } });
		assert.strictEqual(operateOnItem(always), 2);
		const perLanguage = contextFor('{x}', 'typescript', 0, { rules, config: { simpleJumpLanguages: ['typescript'] } });
		assert.strictEqual(operateOnItem(perLanguage), 2);
		assert.deepStrictEqual(recorded.calls, []);
	});

	test('Inspecting a tag has no side effects', () => {
		const ctx = contextFor('if (x) {\n  y;\n}', 'typescript', 1);
		const first = simpleRule.getTag(ctx);
		const second = simpleRule.getTag(ctx);
		assert.notStrictEqual(first, undefined);
		assert.deepStrictEqual(first, second);
		assert.strictEqual(ctx.cursor.position, 1);
	});
});
