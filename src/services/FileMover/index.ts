export type * from "./FileMover";
export { FileMoverDefault } from "./FileMoverDefault";
