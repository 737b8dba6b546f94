export * from "./MediaDateResolver";
export {
  MediaDateResolverDefault,
  defaultDateCacheSize,
} from "./MediaDateResolverDefault";
export * from "./DateTextParser";
export * from "./FileNameDate";
