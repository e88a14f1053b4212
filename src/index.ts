export { WAVLTree } from "./WAVLTree";
export type { InsertResult, DeleteResult } from "./WAVLTree";
export { WAVLNode, opposite, rankOf, refreshSizes, sizeOf } from "./WAVLNode";
export type { Side } from "./WAVLNode";

export { validate, validateSubtree, maxHeightForSize } from "./validate";
export type { TreeStats } from "./validate";
export { OPERATION_COSTS } from "./config";
