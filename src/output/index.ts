export * from './types';
export * from './format';
export { FormattedOutput } from './formatted-output';
export { CiOutput } from './ci-output';
