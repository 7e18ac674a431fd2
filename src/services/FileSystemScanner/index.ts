export type * from "./FileSystemScanner";
export { FileSystemScannerDefault, normalizeExts } from "./FileSystemScannerDefault";
