/**
 * Repository Exports
 */

export { taskHandleRepo } from "./task-handle.repository.js";
export { agentRunRepo } from "./agent-run.repository.js";
