export { env, encodeFormats, ivModes } from './env.js';
export type { AppEnvironment } from './env.js';
