/**
 * @pupkit/breeds: the breed registry.
 */

export {
  BreedRegistry,
  UnknownBreedError,
  createBreedRegistry,
  defaultBreedRegistry,
  configFor,
} from "./registry.js";
