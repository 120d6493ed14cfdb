#!/usr/bin/env node

/**
 * Renders the orbiting scene to numbered PNG frames.
 */

import { Command, InvalidArgumentError } from "commander";
import { run } from "./main";
import { ConfigError } from "./config/RenderConfig";
import { MeshError } from "./utils/Geometry";

function parseCount(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n < 0) {
		throw new InvalidArgumentError("Expected a non-negative integer.");
	}
	return n;
}

function parseSeed(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n)) {
		throw new InvalidArgumentError("Expected an integer.");
	}
	return n;
}

const program = new Command();

program
	.name("orrery-raster")
	.description("Software-rasterized solar system with procedural planet shaders")
	.version("0.1.0")
	.option("-c, --config <file>", "Scene configuration (JSON)")
	.option("-o, --output <dir>", "Output directory for PNG frames", "./frames")
	.option("-f, --frames <count>", "Number of frames to render", parseCount, 1)
	.option("-m, --mesh <file>", "OBJ mesh used for every body (default: UV sphere)")
	.option("-s, --ship <file>", "OBJ mesh for the spaceship (default: box)")
	.option("--seed <n>", "Noise seed (overrides the configuration)", parseSeed)
	.option("-v, --verbose", "Print per-frame statistics", false)
	.action(
		async (options: {
			config?: string;
			output: string;
			frames: number;
			mesh?: string;
			ship?: string;
			seed?: number;
			verbose: boolean;
		}) => {
			try {
				const start = Date.now();
				await run(options);
				console.log(`[Render] Completed in ${Date.now() - start}ms`);
			} catch (error) {
				if (error instanceof ConfigError || error instanceof MeshError) {
					console.error(`Error: ${error.message}`);
				} else {
					// Unexpected: keep the stack
					console.error(error);
				}
				process.exitCode = 1;
			}
		}
	);

program.parseAsync().catch((error: unknown) => {
	console.error("Error:", error instanceof Error ? error.message : error);
	process.exitCode = 1;
});
