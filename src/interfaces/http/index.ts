export { default as normalizeRoutes } from './normalize-routes.js';
export type { NormalizeRoutesOptions } from './normalize-routes.js';
export { buildServer } from './server.js';
