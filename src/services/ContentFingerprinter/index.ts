export * from "./ContentFingerprinter";
export { ContentFingerprinterMd5 } from "./ContentFingerprinterMd5";
