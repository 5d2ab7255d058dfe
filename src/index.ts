/**
 * Entry point for the verification state library.
 *
 * Stage handlers build a Runtime once per process (createRuntime), then
 * receive an envelope, do their work through the EnvelopeManager and hand
 * the updated envelope to the next stage via runStage().
 */

export * from "./errors/index.js";
export * from "./reference/index.js";
export * from "./categories/index.js";
export * from "./codec/index.js";
export * from "./store/index.js";
export * from "./status/index.js";
export * from "./envelope/index.js";
export * from "./table/index.js";
export * from "./stages/index.js";
export * from "./logging/index.js";
export * from "./config/index.js";
