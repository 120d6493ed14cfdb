import { createReadStream, promises as fs } from "node:fs";
import { EventEmitter } from "../core/EventEmitter";

export interface LoadStartEvent {
	path: string;
}
export interface ProgressEvent {
	loaded: number;
	total: number;
	path?: string;
}
export interface ParseProgressEvent {
	current: number;
	total: number;
	message: string;
}

export type LoaderEvents<T> = {
	loadstart: [LoadStartEvent];
	progress: [ProgressEvent];
	parsestart: [];
	parseprogress: [ParseProgressEvent];
	parseend: [T];
	load: [T];
	error: [Error];
};

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * Base Loader class that provides event emission capabilities.
 * Emits:
 * - 'loadstart': When reading begins
 * - 'progress': { loaded, total } while the file is read
 * - 'parsestart': When parsing begins
 * - 'parseprogress': { current, total, message } during parsing
 * - 'load': When loading and parsing is complete
 * - 'error': When an error occurs
 */
export class Loader<T> extends EventEmitter<LoaderEvents<T>> {
	/**
	 * Internal helper to report read progress.
	 * @protected
	 */
	protected async _readWithProgress(path: string): Promise<Buffer> {
		this.emit("loadstart", { path });

		let total: number;
		try {
			total = (await fs.stat(path)).size;
		} catch (error) {
			throw new Error(`Failed to load: ${toError(error).message} (${path})`);
		}

		const chunks: Buffer[] = [];
		let loaded = 0;
		for await (const chunk of createReadStream(path)) {
			const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
			chunks.push(buf);
			loaded += buf.length;
			this.emit("progress", { loaded, total, path });
		}
		return Buffer.concat(chunks);
	}
}
