import * as vscode from 'vscode';
import { deleteItems, jumpItems, selectItems } from './commands';
import { defaultConfig, logDebug, type MatchConfig, readConfig } from './config';
import { type OffsetSelection, openSession, selectionAfterJump } from './editorSession';
import { jumpToPercentage } from './percentage';
import { createDefaultRegistry } from './rules/defaults';

const configSection = 'matching-items';
const rules = createDefaultRegistry();
let config: MatchConfig = { ...defaultConfig };
let itemsStatusBarItem: vscode.StatusBarItem;

function offsetSelection(textEditor: vscode.TextEditor): OffsetSelection {
	const doc = textEditor.document;
	return {
		anchor: doc.offsetAt(textEditor.selection.anchor),
		active: doc.offsetAt(textEditor.selection.active),
	};
}

function applySelection(textEditor: vscode.TextEditor, selection: OffsetSelection) {
	const doc = textEditor.document;
	textEditor.selection = new vscode.Selection(doc.positionAt(selection.anchor), doc.positionAt(selection.active));
	textEditor.revealRange(textEditor.selection);
}

/** Keybindings pass a count either as a bare number or as `{ "count": n }`. */
function countArgument(arg: unknown): number | undefined {
	if (typeof arg === 'number') { return arg; }
	if (typeof arg === 'object' && arg !== null && 'count' in arg && typeof arg.count === 'number') {
		return arg.count;
	}
	return undefined;
}

export function jumpItemsCommand(textEditor: vscode.TextEditor, count?: number) {
	const selection = offsetSelection(textEditor);
	const ctx = openSession(textEditor.document, selection, config, rules);
	const destination = jumpItems(ctx, count);
	if (destination === undefined) { return; }
	applySelection(textEditor, selectionAfterJump(ctx, selection, destination));
}

export function selectItemsCommand(textEditor: vscode.TextEditor, inner: boolean, count?: number) {
	const ctx = openSession(textEditor.document, offsetSelection(textEditor), config, rules);
	const region = selectItems(ctx, count, inner);
	if (!region) { return; }
	applySelection(textEditor, { anchor: region.begin, active: region.end });
}

export function deleteItemsCommand(
	textEditor: vscode.TextEditor, edit: vscode.TextEditorEdit, inner: boolean, count?: number
) {
	const doc = textEditor.document;
	const ctx = openSession(doc, offsetSelection(textEditor), config, rules);
	const region = deleteItems(ctx, count, inner);
	if (!region) { return; }
	logDebug(config, `deleting [${region.begin}, ${region.end})`);
	edit.delete(new vscode.Range(doc.positionAt(region.begin), doc.positionAt(region.end)));
}

export async function jumpToPercentageCommand(textEditor: vscode.TextEditor, percent?: number) {
	if (percent === undefined) {
		const input = await vscode.window.showInputBox({
			prompt: 'Jump to percentage of the document',
			validateInput: value => /^\d+$/.test(value.trim()) ? null : 'Enter a whole number from 1 to 100.',
		});
		if (input === undefined) { return; }
		percent = parseInt(input.trim(), 10);
	}
	const selection = offsetSelection(textEditor);
	const ctx = openSession(textEditor.document, selection, config, rules);
	applySelection(textEditor, selectionAfterJump(ctx, selection, jumpToPercentage(ctx, percent)));
}

function updateStatusBarItem(): void {
	itemsStatusBarItem.text = `Items: ${config.shortcut}${config.percentageJump ? ' N%' : ''}` +
		`${config.alwaysSimpleJump ? ' (simple)' : ''}`;
	itemsStatusBarItem.show();
}

function configurationChangeUpdate(event: vscode.ConfigurationChangeEvent) {
	if (event.affectsConfiguration(configSection)) {
		config = readConfig(vscode.workspace.getConfiguration(configSection));
		updateStatusBarItem();
	}
}

export function activate(context: vscode.ExtensionContext) {
	config = readConfig(vscode.workspace.getConfiguration(configSection));
	logDebug(config, `activating with rules for ${rules.grammars.length} languages`);
	context.subscriptions.push(vscode.workspace.onDidChangeConfiguration(configurationChangeUpdate));

	function newCommand(
		command: string,
		callback: (textEditor: vscode.TextEditor, edit: vscode.TextEditorEdit, ...args: unknown[]) => void
	) {
		context.subscriptions.push(vscode.commands.registerTextEditorCommand(command, callback));
	}

	newCommand('matching-items.jumpItems', (textEditor, _edit, arg) => jumpItemsCommand(textEditor, countArgument(arg)));
	newCommand('matching-items.selectItems',
		(textEditor, _edit, arg) => selectItemsCommand(textEditor, false, countArgument(arg)));
	newCommand('matching-items.selectInnerItems',
		(textEditor, _edit, arg) => selectItemsCommand(textEditor, true, countArgument(arg)));
	newCommand('matching-items.deleteItems',
		(textEditor, edit, arg) => deleteItemsCommand(textEditor, edit, false, countArgument(arg)));
	newCommand('matching-items.deleteInnerItems',
		(textEditor, edit, arg) => deleteItemsCommand(textEditor, edit, true, countArgument(arg)));
	newCommand('matching-items.jumpToPercentage', (textEditor, _edit, arg) => {
		jumpToPercentageCommand(textEditor, countArgument(arg)).catch(err =>
			console.error('matching-items: jump to percentage failed:', err));
	});

	// Register a command that is invoked when the status bar item is selected
	const showSettingsCommandId = 'matching-items.showSettings';
	context.subscriptions.push(vscode.commands.registerCommand(showSettingsCommandId, () => {
		void vscode.window.showInformationMessage(`Matching Items: \`${config.shortcut}\` jumps between items` +
			(config.percentageJump ? ', with a count it jumps to that percentage of the file' : '') +
			(config.alwaysSimpleJump ? '; only brackets and quotes are matched.' : '.'));
	}));
	itemsStatusBarItem = vscode.window.createStatusBarItem(vscode.StatusBarAlignment.Right, 100);
	itemsStatusBarItem.command = showSettingsCommandId;
	context.subscriptions.push(itemsStatusBarItem);
	updateStatusBarItem();
}

export function deactivate() { }
