import { promises as fs } from "node:fs";
import path from "node:path";
import sharp from "sharp";
import type { Framebuffer } from "../core/Framebuffer";
import type { Presenter } from "../core/RenderLoop";

export interface PNGPresenterOptions {
	directory: string;
	/** File name prefix, default "frame-". */
	prefix?: string;
}

export function frameFileName(frame: number, prefix = "frame-"): string {
	return `${prefix}${String(frame).padStart(4, "0")}.png`;
}

/**
 * Writes each presented colour buffer as a numbered PNG.
 */
export class PNGPresenter implements Presenter {
	public readonly directory: string;
	public readonly prefix: string;
	public readonly written: string[] = [];

	private _ready: Promise<void> | null = null;

	constructor(options: PNGPresenterOptions) {
		this.directory = options.directory;
		this.prefix = options.prefix ?? "frame-";
	}

	public static encode(target: Framebuffer): Promise<Buffer> {
		return sharp(Buffer.from(target.color.buffer, target.color.byteOffset, target.color.byteLength), {
			raw: { width: target.width, height: target.height, channels: 3 },
		})
			.png()
			.toBuffer();
	}

	public async present(target: Framebuffer, frame: number): Promise<void> {
		if (!this._ready) {
			this._ready = fs.mkdir(this.directory, { recursive: true }).then(() => undefined);
		}
		await this._ready;

		const file = path.join(this.directory, frameFileName(frame, this.prefix));
		await fs.writeFile(file, await PNGPresenter.encode(target));
		this.written.push(file);
	}
}
