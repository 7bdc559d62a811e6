export { Vector3 } from './vector3.js';
