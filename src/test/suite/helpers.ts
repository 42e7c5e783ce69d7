import type { Logger } from "../../types";

export interface RecordingLogger extends Logger {
	infos: string[];
	warnings: string[];
	errors: string[];
}

export function createRecordingLogger(): RecordingLogger {
	const infos: string[] = [];
	const warnings: string[] = [];
	const errors: string[] = [];
	return {
		infos,
		warnings,
		errors,
		info: (message) => {
			infos.push(message);
		},
		warn: (message) => {
			warnings.push(message);
		},
		error: (message) => {
			errors.push(typeof message === "string" ? message : message.message);
		},
	};
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve(value: T): void;
}

export function createDeferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => undefined;
	const promise = new Promise<T>((res) => {
		resolve = res;
	});
	return { promise, resolve: (value) => resolve(value) };
}
