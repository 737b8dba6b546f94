export * from "./FileSystemScanner";
export {
  FileSystemScannerDefault,
  isSkippedDirectory,
} from "./FileSystemScannerDefault";
