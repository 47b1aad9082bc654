export { NodeFileSystem } from './node_file_system';
