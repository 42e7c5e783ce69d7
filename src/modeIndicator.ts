import * as vscode from "vscode";
import { LineMarker } from "./lineMarker";
import { ModeRegistry } from "./modeRegistry";

/**
 * Status bar lighter showing review progress while the mode is on
 */
export class ModeIndicator {
	private readonly item: vscode.StatusBarItem;
	private disposables: vscode.Disposable[] = [];

	constructor(
		private readonly modeRegistry: ModeRegistry,
		private readonly getMarker: () => LineMarker,
	) {
		this.item = vscode.window.createStatusBarItem(
			vscode.StatusBarAlignment.Left,
			100,
		);
		this.item.command = "lineMarker.toggleMode";
		this.item.tooltip = "Line Marker mode (click to turn off)";

		this.disposables.push(
			vscode.window.onDidChangeActiveTextEditor(() => {
				this.refresh();
			}),
		);

		this.disposables.push(
			vscode.workspace.onDidChangeTextDocument((e) => {
				if (e.document === vscode.window.activeTextEditor?.document) {
					this.refresh();
				}
			}),
		);

		this.disposables.push(
			this.modeRegistry.onDidChangeMode(() => {
				this.refresh();
			}),
		);

		this.refresh();
	}

	/**
	 * Update the lighter for the active editor
	 */
	refresh(): void {
		const editor = vscode.window.activeTextEditor;
		if (!editor || !this.modeRegistry.isEnabled(editor.document)) {
			this.item.hide();
			return;
		}

		const marker = this.getMarker();
		const document = editor.document;
		let marked = 0;
		for (let line = 0; line < document.lineCount; line += 1) {
			if (marker.isMarked(document.lineAt(line).text)) {
				marked += 1;
			}
		}

		this.item.text = `$(checklist) Mark ${marked}/${document.lineCount}`;
		this.item.show();
	}

	dispose(): void {
		this.item.dispose();
		for (const disposable of this.disposables) {
			disposable.dispose();
		}
	}
}
