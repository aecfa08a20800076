/**
 * Matching - Main Export
 *
 * Probe scoring, ranking and the accept/reject decision.
 */

export { euclideanDistance, distancesTo } from "./distance.js";

export {
  authenticate,
  authenticateAsync,
  scoreIdentity,
  compareScores,
  decide,
  MIN_DISTANCE_WEIGHT,
  MEAN_DISTANCE_WEIGHT,
  type RegistryView,
  type AuthenticateOptions,
  type AuthenticateAsyncOptions,
} from "./matching_engine.js";
