/**
 * Exa Research Provider
 * Maps Exa search, contents, answer and research-task responses onto ResearchProvider
 */

import { costOf, type ExaClient, type ExaResult, type ResearchTask } from "@sibyl/exa";
import type {
  AnswerResult,
  DeepTaskSnapshot,
  Priced,
  ResearchProvider,
  SearchQuery,
  SourceDocument,
} from "../../systems/orchestrator/capabilities.js";

export const SNIPPET_MAX_CHARS = 2000;
const CONTENTS_MAX_CHARS = 4000;
const LIST_PAGE_SIZE = 50;
const LIST_MAX_PAGES = 3;

type ExaApi = Pick<
  ExaClient,
  "search" | "getContents" | "answer" | "createResearchTask" | "getResearchTask" | "listResearchTasks"
>;

/**
 * Highlights when present, then body text, then the title
 */
export function toSourceDocument(result: ExaResult, maxChars = SNIPPET_MAX_CHARS): SourceDocument {
  const highlights = result.highlights?.filter((highlight) => highlight.trim().length > 0) ?? [];
  const text = highlights.length > 0
    ? highlights.join(" ... ")
    : result.text
      ? result.text.slice(0, maxChars)
      : (result.title ?? "");

  return {
    url: result.url,
    title: result.title ?? undefined,
    text,
    publishedDate: result.publishedDate ?? undefined,
  };
}

export function toDeepTaskSnapshot(task: ResearchTask): DeepTaskSnapshot {
  return {
    taskId: task.researchId,
    status: task.status,
    createdAt: new Date(task.createdAt).toISOString(),
    instructions: task.instructions,
    output: task.output?.content,
    citations: (task.citations ?? []).map((citation) => ({
      url: citation.url,
      title: citation.title ?? undefined,
      text: citation.title ?? "",
    })),
    cost: task.costDollars ? costOf(task) : undefined,
    error: task.error ?? undefined,
  };
}

export class ExaResearchProvider implements ResearchProvider {
  constructor(private readonly client: ExaApi) {}

  async search(query: SearchQuery, signal?: AbortSignal): Promise<Priced<SourceDocument[]>> {
    const response = await this.client.search(
      {
        query: query.query,
        type: query.searchType,
        numResults: query.numResults,
        category: query.category,
        startPublishedDate: query.startPublishedDate,
        contents: {
          text: query.includeText ? { maxCharacters: SNIPPET_MAX_CHARS } : false,
          highlights: query.includeHighlights,
        },
      },
      signal
    );

    return { value: response.results.map((result) => toSourceDocument(result)), cost: costOf(response) };
  }

  async fetchContents(
    urls: string[],
    options: { includeText: boolean },
    signal?: AbortSignal
  ): Promise<Priced<SourceDocument[]>> {
    const response = await this.client.getContents(
      {
        urls,
        text: options.includeText ? { maxCharacters: CONTENTS_MAX_CHARS } : false,
        highlights: !options.includeText,
      },
      signal
    );

    return {
      value: response.results.map((result) => toSourceDocument(result, CONTENTS_MAX_CHARS)),
      cost: costOf(response),
    };
  }

  async ask(
    query: string,
    options: { includeText: boolean },
    signal?: AbortSignal
  ): Promise<Priced<AnswerResult>> {
    const response = await this.client.answer({ query, text: options.includeText }, signal);

    return {
      value: {
        answer: response.answer,
        citations: response.citations.map((citation) => ({
          url: citation.url,
          title: citation.title ?? undefined,
          text: citation.text ? citation.text.slice(0, SNIPPET_MAX_CHARS) : (citation.title ?? ""),
          publishedDate: citation.publishedDate ?? undefined,
        })),
      },
      cost: costOf(response),
    };
  }

  async createDeepTask(instructions: string): Promise<DeepTaskSnapshot> {
    return toDeepTaskSnapshot(await this.client.createResearchTask({ instructions }));
  }

  async pollDeepTask(taskId: string): Promise<DeepTaskSnapshot> {
    return toDeepTaskSnapshot(await this.client.getResearchTask(taskId));
  }

  async listDeepTasks(): Promise<DeepTaskSnapshot[]> {
    const tasks: DeepTaskSnapshot[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < LIST_MAX_PAGES; page++) {
      const result = await this.client.listResearchTasks({ cursor, limit: LIST_PAGE_SIZE });
      tasks.push(...result.data.map(toDeepTaskSnapshot));
      if (!result.hasMore || !result.nextCursor) break;
      cursor = result.nextCursor;
    }

    return tasks;
  }
}
