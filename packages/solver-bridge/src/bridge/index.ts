export { BaseSolverBridge } from "./baseBridge";
export type { BaseSolverBridgeOptions } from "./baseBridge";
export { LiveSolverBridge } from "./liveBridge";
export type { LiveSolverBridgeOptions } from "./liveBridge";
export { PrecomputedSolverBridge } from "./precomputedBridge";
export { createSolverBridge } from "./factory";
export type { BridgeMode, CreateSolverBridgeOptions, SolverBridgeHandle } from "./factory";
export type { ActionComparison, RequestOptions, SolveOptions, SolverBackend } from "./types";
