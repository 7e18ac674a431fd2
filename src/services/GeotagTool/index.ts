export type * from "./GeotagTool";
export { GeotagToolExifTool } from "./GeotagToolExifTool";
