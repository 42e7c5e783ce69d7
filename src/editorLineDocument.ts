import * as vscode from "vscode";
import type { CursorPosition, LineDocument } from "./types";

/**
 * LineDocument backed by a VS Code text editor
 */
export class EditorLineDocument implements LineDocument {
	constructor(private readonly editor: vscode.TextEditor) {}

	get lineCount(): number {
		return this.editor.document.lineCount;
	}

	lineAt(line: number): string {
		return this.editor.document.lineAt(line).text;
	}

	getCursor(): CursorPosition {
		const active = this.editor.selection.active;
		return { line: active.line, column: active.character };
	}

	setCursor(position: CursorPosition): void {
		const target = this.editor.document.validatePosition(
			new vscode.Position(position.line, position.column),
		);
		this.editor.selection = new vscode.Selection(target, target);
	}

	async replace(
		line: number,
		startColumn: number,
		endColumn: number,
		text: string,
	): Promise<void> {
		const range = new vscode.Range(line, startColumn, line, endColumn);
		const applied = await this.editor.edit((builder) => {
			builder.replace(range, text);
		});
		if (!applied) {
			throw new Error(`Could not edit line ${line + 1}`);
		}
	}

	async typeText(text: string): Promise<void> {
		await vscode.commands.executeCommand("default:type", { text });
	}

	revealCursorInCenter(): void {
		const active = this.editor.selection.active;
		this.editor.revealRange(
			new vscode.Range(active, active),
			vscode.TextEditorRevealType.InCenter,
		);
	}
}
