/**
 * @sibyl/exa
 * Exa research API client
 */

export {
  ExaClient,
  getExaClient,
  resetClient,
  parseRetryAfter,
  type ExaClientOptions,
} from "./client.js";

export {
  CostDollarsSchema,
  ExaResultSchema,
  SearchResponseSchema,
  ContentsResponseSchema,
  AnswerResponseSchema,
  ResearchStatusSchema,
  ResearchTaskSchema,
  ResearchTaskListSchema,
  TERMINAL_RESEARCH_STATUSES,
  isTerminalStatus,
  costOf,
  type CostDollars,
  type SearchType,
  type SearchCategory,
  type ExaResult,
  type SearchRequest,
  type SearchResponse,
  type ContentsOptions,
  type GetContentsRequest,
  type ContentsResponse,
  type AnswerRequest,
  type AnswerCitation,
  type AnswerResponse,
  type ResearchStatus,
  type ResearchTask,
  type ResearchTaskList,
  type ResearchModel,
  type CreateResearchTaskRequest,
} from "./types.js";
