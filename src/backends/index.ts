export { createBackend } from './backendFactory.js';
export type { InferenceBackend } from './inferenceBackend.js';
export { BackendInvoker } from './backendInvoker.js';
export { SageMakerBackend } from './sagemakerBackend.js';
export { HttpBackend } from './httpBackend.js';
