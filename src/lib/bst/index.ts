export * from "./types";
export * from "./config";
export * from "./errors";
export * from "./engine";
export * from "./scenarios";
export { TRAVERSAL_STEPS, INSERT_STEPS, SEARCH_STEPS, DELETE_STEPS } from "./narration";
export {
  inorderKeys,
  preorderKeys,
  postorderKeys,
  isValidBst,
  findNode,
  treeHeight,
  countNodes,
} from "./tree";
