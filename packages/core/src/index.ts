/**
 * @pupkit/core: procedural animation engine for a companion dog.
 *
 * Pose synthesis, the animation state machine and gesture arbitration.
 * No rendering and no runtime dependencies besides @pupkit/schema.
 */

export * from "./animation/index.js";
export * from "./interaction/index.js";
export * from "./timing/index.js";
