export { createServer, startServer } from './server.js';
export type { ApiContext } from './server.js';
