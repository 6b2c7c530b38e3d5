export { parsePositiveInt, parseEnvironment } from './env-utils';
