import * as assert from "assert";
import { DEFAULT_MARKS } from "../../configuration";
import { LineMarker } from "../../lineMarker";
import { MarkAlphabet } from "../../markAlphabet";
import { ModeIndicator } from "../../modeIndicator";
import { ModeRegistry } from "../../modeRegistry";
import {
	fireDocumentChange,
	MockTextDocument,
	resetMock,
	setActiveTextEditor,
	statusBarItems,
} from "../vscodeMock";
import type { MockStatusBarItem } from "../vscodeMock";

suite("ModeIndicator", () => {
	let registry: ModeRegistry;
	let indicator: ModeIndicator;
	let item: MockStatusBarItem;
	let document: MockTextDocument;

	setup(() => {
		resetMock();
		registry = new ModeRegistry();
		document = new MockTextDocument("file:///review/list.txt", [
			"#apple",
			"banana",
			"?cherry",
		]);
		setActiveTextEditor({ document });
		const marker = new LineMarker(new MarkAlphabet(DEFAULT_MARKS));
		indicator = new ModeIndicator(registry, () => marker);
		assert.strictEqual(statusBarItems.length, 1);
		item = statusBarItems[0];
	});

	teardown(() => {
		indicator.dispose();
		registry.dispose();
		resetMock();
	});

	test("lighter is hidden while the mode is off", () => {
		assert.strictEqual(item.visible, false);
		assert.strictEqual(item.command, "lineMarker.toggleMode");
	});

	test("lighter counts marked lines while the mode is on", () => {
		registry.toggle(document);
		assert.strictEqual(item.visible, true);
		assert.strictEqual(item.text, "$(checklist) Mark 2/3");
	});

	test("lighter follows edits to the active document", () => {
		registry.toggle(document);
		document.lines = ["#apple", "#banana", "?cherry", "date"];
		fireDocumentChange(document);
		assert.strictEqual(item.text, "$(checklist) Mark 3/4");
	});

	test("lighter hides when the mode is switched off", () => {
		registry.toggle(document);
		registry.toggle(document);
		assert.strictEqual(item.visible, false);
	});

	test("lighter hides for an editor without the mode", () => {
		registry.toggle(document);
		setActiveTextEditor({
			document: new MockTextDocument("file:///review/other.txt", ["#x"]),
		});
		assert.strictEqual(item.visible, false);

		setActiveTextEditor({ document });
		assert.strictEqual(item.visible, true);
	});

	test("dispose removes the status bar item", () => {
		indicator.dispose();
		assert.strictEqual(item.disposed, true);
	});
});
