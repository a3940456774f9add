export { dirname, isFile, resolveFrom } from './path';
