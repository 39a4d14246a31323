export { createRng, type Rng } from "./rng.js";
export { assertClose, assertRectClose, DEFAULT_TOLERANCE } from "./geometry.js";
export { assert, describe, test } from "./nodeTest.js";
