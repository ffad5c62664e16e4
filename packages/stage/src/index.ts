/**
 * @pupkit/stage: host frame loop for a companion dog.
 *
 * The PixiJS view lives behind the `@pupkit/stage/pixi` entry point so this
 * module can load without a renderer.
 */

export { CompanionStage } from "./companion-stage.js";
export type { CompanionStageOptions } from "./companion-stage.js";
