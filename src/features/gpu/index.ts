/**
 * GPU Rendering Module
 *
 * Backend abstraction, render graph execution and asset textures.
 */

// Backend exports
export * from './backend';

// Graph exports
export * from './graph';

// Asset exports
export * from './assets';
