export * from "./NamingScheme";
export type * from "./RenamePlanner";
export { RenamePlannerDefault } from "./RenamePlannerDefault";
