export type * from "./MetadataTool";
export { MetadataToolExifTool, errorMessage } from "./MetadataToolExifTool";
export type * from "./PhotoTags";
