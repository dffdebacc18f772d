export { FileAdapter } from './file-adapter';
export type { FileAdapterOptions } from './file-adapter';
