export { getFileExtension } from './extension';
