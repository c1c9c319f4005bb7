import type { Rule } from './rule';

/** Ordered rule lists per grammar identifier. Built once at activation, read afterwards. */
export class RuleRegistry {
	private readonly rulesByGrammar = new Map<string, readonly Rule[]>();

	/** Replaces any rules previously registered for `grammarId`. */
	register(grammarId: string, rules: readonly Rule[]): this {
		this.rulesByGrammar.set(grammarId, [...rules]);
		return this;
	}

	registerAll(grammarIds: readonly string[], rules: readonly Rule[]): this {
		for (const grammarId of grammarIds) {
			this.register(grammarId, rules);
		}
		return this;
	}

	lookup(grammarId: string): readonly Rule[] {
		return this.rulesByGrammar.get(grammarId) ?? [];
	}

	get grammars(): string[] {
		return [...this.rulesByGrammar.keys()];
	}
}
