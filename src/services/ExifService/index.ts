export * from "./Exif";
export * from "./ExifService";
export { toTagText } from "./ExifDateTimeHelper";
export {
  ExifServiceExifTool,
  type ExifToolReader,
} from "./ExifServiceExifTool";
