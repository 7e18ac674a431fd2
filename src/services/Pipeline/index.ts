export * from "./applyRenamePlan";
export * from "./cameraZones";
export * from "./forEachRecord";
export type * from "./PipelineOrchestrator";
export { PipelineOrchestratorDefault } from "./PipelineOrchestratorDefault";
export * from "./PipelineSpec";
export type * from "./RunState";
export type * from "./Stage";
export * from "./stages";
