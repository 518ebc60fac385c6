export { DriverSurface, type DriverSurfaceOptions } from './driver-surface.js';
export type { SessionDriver } from './driver.js';
