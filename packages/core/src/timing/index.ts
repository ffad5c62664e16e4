export type { Clock, CancelHandle } from "./clock.js";
export { TestClock } from "./test-clock.js";
export { easeOut } from "./easing.js";
export type { EasingFn } from "./easing.js";
export { BrowserClock, FALLBACK_FRAME_MS } from "./browser-clock.js";
