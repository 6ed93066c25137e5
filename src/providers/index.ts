export { BuiltinDirectory, type ExecutorFactory } from './directory.js';
export { Backend, parseOsRelease, type HostFacts } from './backend.js';
export { Resource, backendOf, bindHandle, type ResourceClass, type ResourceOptions, type ResourceProvider } from './resource.js';
export * from './resources/index.js';
