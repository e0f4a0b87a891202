export * from './ast';
export * from './selection';
export { parse, createValue } from './parser';
