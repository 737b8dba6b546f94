export * from "./VideoProbe";
export {
  VideoProbeFfprobe,
  buildFfprobeArgs,
  creationTimeTagKeys,
} from "./VideoProbeFfprobe";
