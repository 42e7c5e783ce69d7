import * as vscode from "vscode";
import { CONFIG_SECTION, parseConfiguration } from "./configuration";
import { EditorLineDocument } from "./editorLineDocument";
import { KeyDispatcher } from "./keyDispatcher";
import { LineMarker } from "./lineMarker";
import {
	buildDictionaryUrl,
	createBrowserLookup,
	createDuckDuckGoLookup,
	createWikipediaLookup,
} from "./lookupProviders";
import { LookupReporter } from "./lookupReporter";
import { ModeIndicator } from "./modeIndicator";
import { ModeRegistry } from "./modeRegistry";
import { ACTION_NAMES } from "./types";

const NO_RESULT_MESSAGE_TIMEOUT_MS = 5000;

let output: vscode.LogOutputChannel;
let modeRegistry: ModeRegistry;
let modeIndicator: ModeIndicator;
let reporter: LookupReporter;
let marker: LineMarker;
let dispatcher: KeyDispatcher;
let typeOverride: vscode.Disposable | undefined;

function openExternalUrl(url: string): Promise<boolean> {
	return Promise.resolve(vscode.env.openExternal(vscode.Uri.parse(url, true)));
}

function showLookupResult(result: string, query: string): void {
	if (result.length === 0) {
		vscode.window.setStatusBarMessage(
			query.length > 0 ? `No result for "${query}"` : "",
			NO_RESULT_MESSAGE_TIMEOUT_MS,
		);
		return;
	}
	void vscode.window.showInformationMessage(result);
}

function loadConfiguration(): void {
	const settings = vscode.workspace.getConfiguration(CONFIG_SECTION);
	const parsed = parseConfiguration((key) => settings.get<unknown>(key));

	for (const warning of parsed.warnings) {
		output.warn(`Ignoring setting: ${warning}`);
	}
	if (parsed.alphabetError) {
		output.error(parsed.alphabetError);
		void vscode.window.showErrorMessage(
			`Line Marker: ${parsed.alphabetError.message}. Using the default marks.`,
		);
	}

	const { config } = parsed;
	const httpOptions = { timeoutMs: config.lookupTimeoutMs };
	marker = new LineMarker(parsed.alphabet);
	dispatcher = new KeyDispatcher(
		marker,
		config.actionKeys,
		{
			duckDuckGo: createDuckDuckGoLookup(httpOptions),
			wikipedia: createWikipediaLookup(config.wikipediaLanguage, httpOptions),
			browser: createBrowserLookup(openExternalUrl),
			dictionary: createBrowserLookup(openExternalUrl, (item) =>
				buildDictionaryUrl(config.dictionaryHost, item),
			),
		},
		reporter,
		output,
	);
	output.info(
		`Marks: ${config.marks.map((m) => `${m.key}=${m.glyph}`).join(" ")}`,
	);
}

/**
 * Own the `type` command only while some document has the mode on
 */
function updateTypeOverride(): void {
	if (modeRegistry.hasAnyEnabled()) {
		if (!typeOverride) {
			try {
				typeOverride = vscode.commands.registerCommand("type", onType);
			} catch (error) {
				// Another extension (usually a Vim emulation) already owns `type`.
				output.error(error instanceof Error ? error : String(error));
				void vscode.window.showErrorMessage(
					"Line Marker: typing is handled by another extension; use the Line Marker commands instead.",
				);
			}
		}
	} else if (typeOverride) {
		typeOverride.dispose();
		typeOverride = undefined;
	}
}

async function runReported(task: () => Promise<unknown>): Promise<void> {
	try {
		await task();
	} catch (error) {
		const failure = error instanceof Error ? error : new Error(String(error));
		output.error(failure);
		void vscode.window.showErrorMessage(`Line Marker: ${failure.message}`);
	}
}

async function onType(args: unknown): Promise<void> {
	const text: unknown =
		typeof args === "object" && args !== null
			? Reflect.get(args, "text")
			: undefined;
	const editor = vscode.window.activeTextEditor;

	if (
		!editor ||
		typeof text !== "string" ||
		[...text].length !== 1 ||
		!modeRegistry.isEnabled(editor.document) ||
		editor.selections.length > 1 ||
		!editor.selection.isEmpty
	) {
		await runReported(() =>
			dispatcher.passThrough(() =>
				Promise.resolve(vscode.commands.executeCommand("default:type", args)),
			),
		);
		return;
	}

	await runReported(() =>
		dispatcher.handleKey(new EditorLineDocument(editor), text),
	);
}

export function activate(context: vscode.ExtensionContext): void {
	console.log("Line Marker extension is now active!");

	output = vscode.window.createOutputChannel("Line Marker", { log: true });
	modeRegistry = new ModeRegistry();
	reporter = new LookupReporter(showLookupResult, output);
	loadConfiguration();
	modeIndicator = new ModeIndicator(modeRegistry, () => marker);

	// Register commands
	const commands = [
		vscode.commands.registerCommand("lineMarker.toggleMode", toggleMode),
		vscode.commands.registerCommand("lineMarker.toggleMark", toggleMark),
		...ACTION_NAMES.map((action) =>
			vscode.commands.registerCommand(`lineMarker.${action}`, () =>
				runInActiveEditor((doc) => dispatcher.runAction(doc, action)),
			),
		),
	];

	const modeListener = modeRegistry.onDidChangeMode((change) => {
		output.info(
			`Mode ${change.enabled ? "on" : "off"} for ${change.documentUri}`,
		);
		updateTypeOverride();
	});

	const closeListener = vscode.workspace.onDidCloseTextDocument((document) => {
		modeRegistry.forget(document);
	});

	const configurationListener = vscode.workspace.onDidChangeConfiguration(
		(e) => {
			if (e.affectsConfiguration(CONFIG_SECTION)) {
				loadConfiguration();
				modeIndicator.refresh();
			}
		},
	);

	context.subscriptions.push(
		output,
		...commands,
		modeListener,
		closeListener,
		configurationListener,
		new vscode.Disposable(() => {
			typeOverride?.dispose();
			typeOverride = undefined;
		}),
		modeIndicator,
		modeRegistry,
	);
}

async function runInActiveEditor(
	task: (doc: EditorLineDocument) => Promise<unknown>,
): Promise<void> {
	const editor = vscode.window.activeTextEditor;
	if (!editor) {
		vscode.window.showWarningMessage("No active editor");
		return;
	}
	await runReported(() => task(new EditorLineDocument(editor)));
}

function toggleMode(): void {
	const editor = vscode.window.activeTextEditor;
	if (!editor) {
		vscode.window.showWarningMessage("No active editor");
		return;
	}

	const enabled = modeRegistry.toggle(editor.document);
	vscode.window.setStatusBarMessage(
		`Line Marker ${enabled ? "on" : "off"}`,
		2000,
	);
}

async function toggleMark(args?: { key?: unknown }): Promise<void> {
	const key = args?.key;
	if (typeof key !== "string") {
		const picked = await vscode.window.showQuickPick(
			marker.getAlphabet().keys.map((candidate) => ({
				label: marker.getAlphabet().glyphForKey(candidate) ?? candidate,
				description: `key ${candidate}`,
				key: candidate,
			})),
			{ placeHolder: "Select a mark to toggle on this line" },
		);
		if (!picked) {
			return;
		}
		await runInActiveEditor((doc) => dispatcher.toggleMark(doc, picked.key));
		return;
	}
	await runInActiveEditor((doc) => dispatcher.toggleMark(doc, key));
}

export function deactivate() {
	// Cleanup handled by disposables
}
