export { LokiAdapter } from './loki-adapter';
export type { LokiAdapterOptions } from './loki-adapter';
