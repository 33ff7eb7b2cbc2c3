export { Graph } from './Graph';
export type { NodeComparator } from './Graph';
