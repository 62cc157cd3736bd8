export { createRng, nextInt, type Rng } from "./rng.js";
export { assert, describe, test } from "./nodeTest.js";
