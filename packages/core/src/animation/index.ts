export { DOG_ANIMATION_STATES, isDogAnimationState } from "./animation-state.js";
export type { DogAnimationState } from "./animation-state.js";

export {
  NEUTRAL_TRANSFORM,
  TRANSFORM_NUMERIC_KEYS,
  createTransform,
  lerpTransform,
  transformsEqual,
  isFiniteTransform,
} from "./bone-transform.js";
export type {
  DogBoneTransform,
  DogBoneTransformNumericKey,
} from "./bone-transform.js";

export { DOG_EXPRESSIONS, expressionFromState } from "./expression.js";
export type { DogExpression, DogExpressionName } from "./expression.js";

export {
  PHASE_WRAP_SECONDS,
  MAX_FRAME_SECONDS,
  BACK_LEG_LAG,
  WALK_GAIT,
  ZOOMIES_GAIT,
  PETTING_HEAD_BIAS,
  PETTING_WAG_FREQUENCY,
  SLEEP_CROUCH,
  gaitPose,
  idlePose,
  sittingPose,
  tailWagPose,
  headTiltPose,
  pettingPose,
  sleepingPose,
  synthesizePose,
} from "./poses.js";
export type { GaitParams } from "./poses.js";

export { DogAnimationController } from "./animation-controller.js";
export type {
  DogAnimationControllerOptions,
  AnimationStateListener,
} from "./animation-controller.js";
