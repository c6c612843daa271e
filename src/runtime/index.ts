export { Runtime, createRuntime, createRuntimeFromEnv, type RuntimeOptions } from './runtime.js';
