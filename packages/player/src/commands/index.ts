export * from './registry';
export { nativeHandlers, runNative } from './native';
export type { NativeHandler, NativeHandlers } from './native';
