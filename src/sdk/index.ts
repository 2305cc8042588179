/**
 * Hosting-side API: configuration and the process-wide normalizer.
 */

export { JIDConfig } from "./config.js";
export {
  defaultNormalizer,
  createNormalizer,
  configureDefaults,
  resetDefaults,
} from "./defaults.js";
