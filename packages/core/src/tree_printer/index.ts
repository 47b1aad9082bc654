export { renderTree } from './tree_printer';
