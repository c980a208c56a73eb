/**
 * @since 0.1.0
 */
export * from "./Config.js"
export * from "./Equations.js"
export * from "./Errors.js"
export * from "./Job.js"
export * from "./JobStore.js"
export * from "./Notifications.js"
export * from "./Orchestrator.js"
export * from "./Solver.js"
export * from "./Types.js"
