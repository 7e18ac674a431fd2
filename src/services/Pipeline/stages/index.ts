export { GeotagStage } from "./GeotagStage";
export { OrganizeStage } from "./OrganizeStage";
export { RenameStage } from "./RenameStage";
export { SetTimeStage } from "./SetTimeStage";
export { ShiftToUtcStage } from "./ShiftToUtcStage";
