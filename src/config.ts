export interface MatchConfig {
	/** Key shown in the status bar for the jump command. */
	shortcut: string;
	/** Interpret a numeric argument to the jump command as a percentage of the document. */
	percentageJump: boolean;
	/** Always use the built-in delimiter scanner, bypassing grammar rules. */
	alwaysSimpleJump: boolean;
	/** Languages for which the built-in delimiter scanner is always used. */
	simpleJumpLanguages: string[];
	/** Languages where the closing line of a block is content, so inner regions keep it. */
	innerKeepsLastLine: string[];
	/** Languages where delimiter matching is suppressed near the end of a line. */
	lineEndGuardLanguages: string[];
	/** Distance from the line end at which the guard applies; 1 is the last-but-one column, i.e. the line's last character. */
	lineEndGuardOffset: number;
	debug: boolean;
}

export const defaultConfig: Readonly<MatchConfig> = {
	shortcut: '%',
	percentageJump: true,
	alwaysSimpleJump: false,
	simpleJumpLanguages: [],
	innerKeepsLastLine: ['python'],
	// Opt-in: no grammar is guarded unless configured.
	lineEndGuardLanguages: [],
	lineEndGuardOffset: 1,
	debug: false,
};

/** The subset of `vscode.WorkspaceConfiguration` needed to read settings. */
export interface ConfigurationSection {
	get(key: string): unknown;
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function pick<K extends keyof MatchConfig>(
	section: ConfigurationSection, key: K, valid: (value: unknown) => value is MatchConfig[K]
): MatchConfig[K] {
	const value = section.get(key);
	if (value === undefined) { return defaultConfig[key]; }
	if (!valid(value)) {
		console.assert(false, `Invalid setting matching-items.${key}: ${JSON.stringify(value)}.`);
		return defaultConfig[key];
	}
	return value;
}

const isString = (value: unknown): value is string => typeof value === 'string' && value.length > 0;
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isOffset = (value: unknown): value is number =>
	typeof value === 'number' && Number.isInteger(value) && value >= 0;

/** Reads the `matching-items` configuration section, falling back to defaults for missing or invalid values. */
export function readConfig(section: ConfigurationSection): MatchConfig {
	return {
		shortcut: pick(section, 'shortcut', isString),
		percentageJump: pick(section, 'percentageJump', isBoolean),
		alwaysSimpleJump: pick(section, 'alwaysSimpleJump', isBoolean),
		simpleJumpLanguages: pick(section, 'simpleJumpLanguages', isStringArray),
		innerKeepsLastLine: pick(section, 'innerKeepsLastLine', isStringArray),
		lineEndGuardLanguages: pick(section, 'lineEndGuardLanguages', isStringArray),
		lineEndGuardOffset: pick(section, 'lineEndGuardOffset', isOffset),
		debug: pick(section, 'debug', isBoolean),
	};
}

export function logDebug(config: MatchConfig, message: string): void {
	if (config.debug) {
		console.log(`matching-items: ${message}`);
	}
}
