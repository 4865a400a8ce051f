export { StreamLineTransport } from './line-transport.js';
export type { LineTransport, StreamLineTransportOptions } from './line-transport.js';
