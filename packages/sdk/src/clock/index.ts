export type { Clock } from "./clock.js";
export { SystemClock, ManualClock } from "./clock.js";
