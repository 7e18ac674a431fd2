export type { DumpWriter } from "./DumpWriter";
export { DumpWriterDefault } from "./DumpWriterDefault";
