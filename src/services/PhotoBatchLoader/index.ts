export * from "./createPhotoRecord";
export type * from "./PhotoBatchLoader";
export { PhotoBatchLoaderDefault } from "./PhotoBatchLoaderDefault";
