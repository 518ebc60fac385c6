export { FakeDriver, type ClickHandler, type FakeElement } from './fake-driver.js';
export { FakeSurface, createSnapshot, type FakeSurfaceScript } from './fake-surface.js';
