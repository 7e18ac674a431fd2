export * from "./TimezoneCityTable";
export * from "./TimezoneOffset";
export type * from "./TimezoneResolver";
export { TimezoneResolverDefault } from "./TimezoneResolverDefault";
export { resolveAtWallClock } from "./resolveAtWallClock";
