import { OrbitBody, type OrbitDescriptor } from "./OrbitBody";
import { Spaceship } from "./Spaceship";
import { MeshFactory } from "../models/MeshFactory";
import { validateMesh } from "../utils/Geometry";
import type { Camera } from "../cameras/Camera";
import type { SceneComposer } from "../core/RenderLoop";
import type { InputState } from "../input/InputSource";
import type { DrawCall, Mesh } from "../core/types";
import type { RenderConfig } from "../config/RenderConfig";

export interface SolarSystemMeshes {
	/** Unit-radius mesh shared by every body. */
	body?: Mesh;
	ship?: Mesh;
}

/**
 * Scene composer for orbiting bodies plus the optional spaceship. Owns all
 * per-body state; the renderer only sees the draw calls.
 */
export class SolarSystem implements SceneComposer {
	public readonly bodies: OrbitBody[];
	public readonly bodyMesh: Mesh;
	public spaceship: Spaceship | null;

	constructor(bodies: OrbitDescriptor[], bodyMesh: Mesh, spaceship: Spaceship | null = null) {
		this.bodies = bodies.map((d) => new OrbitBody(d));
		this.bodyMesh = bodyMesh;
		this.spaceship = spaceship;
	}

	public static fromConfig(config: RenderConfig, meshes: SolarSystemMeshes = {}): SolarSystem {
		if (meshes.body) validateMesh(meshes.body);
		if (meshes.ship) validateMesh(meshes.ship);

		const bodyMesh =
			meshes.body ?? MeshFactory.createSphere(1, config.sphere.segments, config.sphere.rings);

		const ship = config.spaceship.enabled
			? new Spaceship(meshes.ship ?? MeshFactory.createBox(1), {
					distance: config.spaceship.distance,
					drop: config.spaceship.drop,
					scale: config.spaceship.scale,
				})
			: null;

		return new SolarSystem(config.bodies, bodyMesh, ship);
	}

	public find(name: string): OrbitBody | undefined {
		return this.bodies.find((b) => b.name === name);
	}

	public update(_time: number, input: InputState, camera: Camera): void {
		this.spaceship?.update(input, camera);
	}

	public drawCalls(time: number): DrawCall[] {
		const calls = this.bodies.map((body) => body.drawCall(this.bodyMesh, time));
		if (this.spaceship) calls.push(this.spaceship.drawCall());
		return calls;
	}
}
