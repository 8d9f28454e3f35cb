/**
 * Seniority Scoring
 *
 * Maps job titles to a decision-power score (1-10) and a hierarchy level
 * using the keyword tables in `data/seniority.json`. Rules are checked in
 * file order and the first rule with a whole-word keyword match wins.
 *
 * @module stages/roles/seniority
 */

import { z } from 'zod';
import seniorityTable from '../data/seniority.json';

const KeywordsSchema = z.array(z.string().min(1)).min(1);

const SeniorityTableSchema = z.object({
  defaultScore: z.number().int().min(1).max(10),
  scores: z.array(z.object({ keywords: KeywordsSchema, score: z.number().int().min(1).max(10) })),
  defaultLevel: z.string(),
  levels: z.array(z.object({ keywords: KeywordsSchema, level: z.string() })),
});

const table = SeniorityTableSchema.parse(seniorityTable);

/** Minimum decision power for a person to count as a decision maker */
export const ACCEPT_THRESHOLD = 6;

/** Decision power that marks a senior decision maker */
export const SENIOR_THRESHOLD = 7;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordMatcher(keywords: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${keywords.map(escapeRegExp).join('|')})\\b`, 'i');
}

const scoreRules = table.scores.map((rule) => ({
  pattern: keywordMatcher(rule.keywords),
  score: rule.score,
}));

const levelRules = table.levels.map((rule) => ({
  pattern: keywordMatcher(rule.keywords),
  level: rule.level,
}));

/**
 * Decision power of a title, 1-10.
 *
 * @example
 * getDecisionPower('VP Sales'); // 8
 * getDecisionPower('Sales Lead'); // 4
 */
export function getDecisionPower(title: string): number {
  return scoreRules.find((rule) => rule.pattern.test(title))?.score ?? table.defaultScore;
}

/**
 * Hierarchy level label for a title (C-Suite, EVP/SVP, VP, Director, ...).
 */
export function getHierarchyLevel(title: string): string {
  return levelRules.find((rule) => rule.pattern.test(title))?.level ?? table.defaultLevel;
}

export function isDecisionMaker(decisionPower: number): boolean {
  return decisionPower >= ACCEPT_THRESHOLD;
}
