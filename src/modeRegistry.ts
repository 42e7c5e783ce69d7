import * as vscode from "vscode";

export interface ModeChange {
	documentUri: string;
	enabled: boolean;
}

/** The part of a text document the registry keys on */
export interface ModeDocument {
	readonly uri: { toString(): string };
}

/**
 * Tracks which open documents have the marker mode switched on
 */
export class ModeRegistry {
	private readonly enabledDocuments: Set<string> = new Set();
	private readonly _onDidChangeMode = new vscode.EventEmitter<ModeChange>();
	public readonly onDidChangeMode = this._onDidChangeMode.event;

	isEnabled(document: ModeDocument): boolean {
		return this.enabledDocuments.has(document.uri.toString());
	}

	hasAnyEnabled(): boolean {
		return this.enabledDocuments.size > 0;
	}

	/**
	 * Flip the mode for a document and return the new state
	 */
	toggle(document: ModeDocument): boolean {
		const enabled = !this.isEnabled(document);
		this.set(document.uri.toString(), enabled);
		return enabled;
	}

	forget(document: ModeDocument): void {
		this.set(document.uri.toString(), false);
	}

	private set(documentUri: string, enabled: boolean): void {
		const changed = enabled
			? !this.enabledDocuments.has(documentUri)
			: this.enabledDocuments.delete(documentUri);
		if (enabled) {
			this.enabledDocuments.add(documentUri);
		}
		if (changed) {
			this._onDidChangeMode.fire({ documentUri, enabled });
		}
	}

	dispose(): void {
		this.enabledDocuments.clear();
		this._onDidChangeMode.dispose();
	}
}
