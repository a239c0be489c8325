export { TreePartition } from "./tree-partition";
