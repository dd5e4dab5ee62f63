export { BasicMediaResolver } from './MediaResolver';
export type { MediaResolver } from './MediaResolver';
