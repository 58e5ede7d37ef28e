export { createRng, type Rng } from "./rng.js";
export { createManualClock, type ManualClock } from "./clock.js";
export { createWarnCapture, type WarnCapture } from "./capture.js";
export { assert, describe, test } from "./nodeTest.js";
