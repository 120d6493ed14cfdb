import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { afterEach, describe, it, expect } from "vitest";
import { PNGPresenter, frameFileName } from "./PNGPresenter";
import { Framebuffer } from "../core/Framebuffer";
import { Color } from "../utils/Color";

const dirs: string[] = [];

async function tempDir(): Promise<string> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), "orrery-"));
	dirs.push(dir);
	return dir;
}

afterEach(async () => {
	await Promise.all(dirs.splice(0).map((d) => fs.rm(d, { recursive: true, force: true })));
});

describe("frameFileName", () => {
	it("zero-pads the frame number", () => {
		expect(frameFileName(3)).toBe("frame-0003.png");
		expect(frameFileName(12345, "shot-")).toBe("shot-12345.png");
	});
});

describe("PNGPresenter", () => {
	it("encodes the colour buffer losslessly", async () => {
		const fb = new Framebuffer({ width: 4, height: 2 });
		fb.clear(new Color(10, 20, 30));
		fb.setPixel(3, 1, new Color(255, 0, 128));

		const png = await PNGPresenter.encode(fb);
		expect(Array.from(png.subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);

		const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
		expect([info.width, info.height, info.channels]).toEqual([4, 2, 3]);
		expect(Array.from(data.subarray(0, 3))).toEqual([10, 20, 30]);
		expect(Array.from(data.subarray(21, 24))).toEqual([255, 0, 128]);
	});

	it("creates the directory and numbers the files", async () => {
		const directory = path.join(await tempDir(), "nested", "frames");
		const presenter = new PNGPresenter({ directory });
		const fb = new Framebuffer({ width: 2, height: 2 });
		fb.clear();

		await presenter.present(fb, 0);
		await presenter.present(fb, 1);

		expect(presenter.written).toEqual([
			path.join(directory, "frame-0000.png"),
			path.join(directory, "frame-0001.png"),
		]);
		expect((await fs.readdir(directory)).sort()).toEqual(["frame-0000.png", "frame-0001.png"]);
	});
});
