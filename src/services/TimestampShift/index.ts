export type * from "./TimestampShiftService";
export { TimestampShiftServiceDefault } from "./TimestampShiftServiceDefault";
export * from "./WallClock";
