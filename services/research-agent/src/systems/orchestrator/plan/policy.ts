/**
 * Cost Policy
 * Per-mode estimates for every provider action, in USD
 */

import type { Action, ResearchMode, SearchType } from "../types.js";
import { assertNever } from "../types.js";

/** Estimates carry a margin over list prices */
const SAFETY_MARGIN = 1.2;

const SEARCH_BASE = 0.005;
const DEEP_SEARCH_BASE = 0.015;
const PER_PAGE_TEXT = 0.001;
const PER_PAGE_HIGHLIGHTS = 0.001;
const ANSWER_WITH_TEXT = 0.05;
const ANSWER_WITHOUT_TEXT = 0.03;
const DEEP_TASK = 0.5;

export interface SearchCostInput {
  searchType: SearchType;
  numResults: number;
  includeText: boolean;
  includeHighlights: boolean;
}

/**
 * Round to whole micro-dollars so estimates compare exactly
 */
export function roundUsd(amount: number): number {
  return Math.round(amount * 1_000_000) / 1_000_000;
}

export function estimateSearchCost(input: SearchCostInput): number {
  const base = input.searchType === "deep" ? DEEP_SEARCH_BASE : SEARCH_BASE;
  const perPage =
    (input.includeText ? PER_PAGE_TEXT : 0) + (input.includeHighlights ? PER_PAGE_HIGHLIGHTS : 0);
  return roundUsd((base + input.numResults * perPage) * SAFETY_MARGIN);
}

export function estimateContentsCost(pages: number): number {
  return roundUsd(pages * PER_PAGE_TEXT * SAFETY_MARGIN);
}

export function estimateAnswerCost(includeText: boolean): number {
  return includeText ? ANSWER_WITH_TEXT : ANSWER_WITHOUT_TEXT;
}

export function estimateDeepTaskCost(): number {
  return DEEP_TASK;
}

export interface ModeSettings {
  searchType: SearchType;
  numResults: number;
  includeText: boolean;
  includeHighlights: boolean;
  contentsLimit: number;
}

export function modeSettings(mode: ResearchMode): ModeSettings {
  switch (mode) {
    case "fast":
      return { searchType: "fast", numResults: 5, includeText: false, includeHighlights: true, contentsLimit: 5 };
    case "standard":
      return { searchType: "auto", numResults: 10, includeText: true, includeHighlights: true, contentsLimit: 5 };
    case "deep":
      return { searchType: "deep", numResults: 10, includeText: true, includeHighlights: true, contentsLimit: 5 };
    default:
      return assertNever(mode, "research mode");
  }
}

export type CostOverrides = Partial<Record<Action, number>>;
