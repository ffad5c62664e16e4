export { MOOD_ANIMATIONS, MOOD_KEYS, isMoodKey, animationStateForMood } from "./mood.js";
export type { MoodKey } from "./mood.js";

export { DogInteractionController } from "./interaction-controller.js";
export type { InteractionMode, GestureTarget } from "./interaction-controller.js";

export {
  GestureRecognizer,
  DEFAULT_LONG_PRESS_MS,
  DEFAULT_PAN_SLOP,
} from "./gesture-recognizer.js";
export type { GestureRecognizerOptions, GesturePhase } from "./gesture-recognizer.js";
