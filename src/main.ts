import {
	Renderer,
	RenderLoop,
	Camera,
	SolarSystem,
	Starfield,
	OBJLoader,
	GradientNoise,
	ScriptedInput,
	PNGPresenter,
	loadConfig,
	normalizeMeshSize,
	type Mesh,
	type Presenter,
	type InputSource,
	type RenderConfig,
} from "./index";

export interface OrreryOptions {
	config?: string;
	output: string;
	frames: number;
	mesh?: string;
	ship?: string;
	seed?: number;
	verbose?: boolean;
	/** Overrides the PNG presenter, mainly for tests. */
	presenter?: Presenter;
	input?: InputSource;
}

/** Loads an OBJ and rescales it so its largest extent is `size`. */
async function loadMesh(path: string, size: number, verbose: boolean): Promise<Mesh> {
	const loader = new OBJLoader();

	loader.on("progress", (event) => {
		const { loaded, total, path: file } = event;
		if (!total || !verbose) return;
		const percent = ((loaded / total) * 100).toFixed(1);
		console.log(`[Loading] ${file}: ${percent}%`);
	});

	const mesh = await loader.load(path);
	console.log(
		`[Loading] ${path}: ${mesh.vertices.length} vertices, ${mesh.indices.length / 3} triangles`
	);
	return normalizeMeshSize(mesh, size);
}

export async function createOrrery(options: OrreryOptions, config?: RenderConfig) {
	const cfg = config ?? (await loadConfig(options.config));

	const [body, ship] = await Promise.all([
		options.mesh ? loadMesh(options.mesh, 2, options.verbose ?? false) : undefined,
		options.ship ? loadMesh(options.ship, 1, options.verbose ?? false) : undefined,
	]);

	const renderer = new Renderer({
		width: cfg.width,
		height: cfg.height,
		background: cfg.background,
		clipMargin: cfg.clipMargin,
		cullBackFaces: cfg.cullBackFaces,
		noise: new GradientNoise(options.seed ?? cfg.seed),
		backgroundPass: cfg.starfield.enabled
			? new Starfield({ stars: cfg.starfield.stars, galaxies: cfg.starfield.galaxies })
			: null,
	});

	const camera = new Camera({
		...cfg.camera,
		fov: cfg.fov,
		near: cfg.near,
		far: cfg.far,
	});

	const scene = SolarSystem.fromConfig(cfg, { body, ship });

	const loop = new RenderLoop({
		renderer,
		camera,
		scene,
		input: options.input ?? new ScriptedInput(options.frames),
		presenter: options.presenter ?? new PNGPresenter({ directory: options.output }),
		timeStep: cfg.timeStep,
	});

	if (options.verbose) {
		renderer.on("frameend", (stats) => {
			console.log(
				`[Render] frame ${stats.frame} t=${stats.time.toFixed(2)}: ` +
					`${stats.accepted}/${stats.triangles} triangles ` +
					`(clipped ${stats.clipped}, backface ${stats.backface}, degenerate ${stats.degenerate}), ` +
					`${stats.shaded}/${stats.fragments} fragments shaded in ${stats.durationMs.toFixed(1)}ms`
			);
		});
	}

	loop.on("stop", ({ frames, time }) => {
		console.log(`[Render] ${frames} frame(s) written to ${options.output} (t=${time.toFixed(2)})`);
	});

	return { config: cfg, renderer, camera, scene, loop };
}

export async function run(options: OrreryOptions): Promise<number> {
	const { loop, config } = await createOrrery(options);
	console.log(
		`[Render] ${config.width}x${config.height}, ${config.bodies.length} bodies, ${options.frames} frame(s)`
	);
	return loop.run();
}
