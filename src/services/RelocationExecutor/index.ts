export * from "./RelocationExecutor";
export {
  RelocationExecutorDefault,
  type RelocationFs,
} from "./RelocationExecutorDefault";
