/**
 * ThreeSceneRenderer: headless render sink backed by a three.js scene graph.
 *
 * Each scene object becomes a unit wireframe cube (box edges as line
 * segments) placed at the object's position and scaled uniformly. The camera
 * sits 30 units back and 5 up from the origin. Presentation is left to the
 * host through `present`, which receives the scene and camera after every
 * update; without it the renderer only maintains the scene graph.
 */

import * as THREE from 'three';

import type { NexLogger, UiNode } from '@nex/core';

import type { RenderableObject, RenderSink } from './render-sink.js';

export interface ThreeSceneRendererOptions {
  width?: number;
  height?: number;
  /** Host hook that draws the scene, e.g. a WebGLRenderer's render call. */
  present?: (scene: THREE.Scene, camera: THREE.PerspectiveCamera, ui: readonly UiNode[]) => void;
  logger?: NexLogger;
}

interface ThreeResources {
  scene: THREE.Scene;
  camera: THREE.PerspectiveCamera;
  geometry: THREE.EdgesGeometry;
  material: THREE.LineBasicMaterial;
  cubes: THREE.LineSegments[];
}

const DEFAULT_WIDTH = 800;
const DEFAULT_HEIGHT = 600;
const CAMERA_FOV = 60;
const CAMERA_NEAR = 0.1;
const CAMERA_FAR = 1000;
const CAMERA_OFFSET = new THREE.Vector3(0, 5, 30);
const WIREFRAME_COLOR = 0xffffff;

export class ThreeSceneRenderer implements RenderSink {
  readonly width: number;
  readonly height: number;

  private readonly present: ThreeSceneRendererOptions['present'];
  private readonly logger: NexLogger;
  private resources: ThreeResources | null = null;
  private frameCount = 0;

  constructor(options: ThreeSceneRendererOptions = {}) {
    this.width = options.width ?? DEFAULT_WIDTH;
    this.height = options.height ?? DEFAULT_HEIGHT;
    this.present = options.present;
    this.logger = options.logger ?? console;
  }

  init(): void {
    if (this.resources) {
      return;
    }

    const scene = new THREE.Scene();
    scene.name = 'nex-scene';

    const camera = new THREE.PerspectiveCamera(
      CAMERA_FOV,
      this.width / this.height,
      CAMERA_NEAR,
      CAMERA_FAR,
    );
    camera.position.copy(CAMERA_OFFSET);
    camera.lookAt(0, 5, 0);

    const box = new THREE.BoxGeometry(1, 1, 1);
    const geometry = new THREE.EdgesGeometry(box);
    box.dispose();

    this.resources = {
      scene,
      camera,
      geometry,
      material: new THREE.LineBasicMaterial({ color: WIREFRAME_COLOR }),
      cubes: [],
    };
    this.frameCount = 0;
    this.logger.debug(`[ThreeSceneRenderer] Scene created (${this.width}x${this.height})`);
  }

  render(objects: readonly RenderableObject[], ui: readonly UiNode[]): void {
    const resources = this.resources;
    if (!resources) {
      throw new Error('ThreeSceneRenderer.render() called before init()');
    }

    this.syncCubeCount(resources, objects.length);
    objects.forEach((object, index) => {
      const cube = resources.cubes[index];
      if (!cube) {
        return;
      }
      cube.name = object.name;
      cube.position.set(object.position.x, object.position.y, object.position.z);
      cube.scale.setScalar(object.scale);
    });

    this.frameCount += 1;
    this.present?.(resources.scene, resources.camera, ui);
  }

  shutdown(): void {
    const resources = this.resources;
    if (!resources) {
      return;
    }
    for (const cube of resources.cubes) {
      resources.scene.remove(cube);
    }
    resources.cubes.length = 0;
    resources.geometry.dispose();
    resources.material.dispose();
    this.resources = null;
    this.logger.debug(`[ThreeSceneRenderer] Disposed after ${this.frameCount} frame(s)`);
  }

  getScene(): THREE.Scene | null {
    return this.resources?.scene ?? null;
  }

  getCamera(): THREE.PerspectiveCamera | null {
    return this.resources?.camera ?? null;
  }

  getFrameCount(): number {
    return this.frameCount;
  }

  /** Object count never changes during a run, so this only grows on the first frame. */
  private syncCubeCount(resources: ThreeResources, count: number): void {
    while (resources.cubes.length < count) {
      const cube = new THREE.LineSegments(resources.geometry, resources.material);
      resources.cubes.push(cube);
      resources.scene.add(cube);
    }
    while (resources.cubes.length > count) {
      const cube = resources.cubes.pop();
      if (cube) {
        resources.scene.remove(cube);
      }
    }
  }
}
