export { decideEscalation, escalationTriggers, type GateInput, type GatePolicy } from "./gate.js";
export {
  runConsistencyCritic,
  runResearchCritic,
  runSynthesisCritic,
  type CriticCandidate,
  type CriticRun,
} from "./critics.js";
export {
  Supervisor,
  aggregate,
  majorityConfidence,
  median,
  unionFactors,
  type SupervisionInput,
  type SupervisionResult,
  type SupervisorDependencies,
} from "./supervisor.js";
